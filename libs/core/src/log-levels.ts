import { LogLevel } from '@nestjs/common';
import { Env } from './env.schema';

const ORDERED: Array<{ key: Env['LOG_LEVEL']; nest: LogLevel }> = [
  { key: 'fatal', nest: 'fatal' },
  { key: 'error', nest: 'error' },
  { key: 'warn', nest: 'warn' },
  { key: 'info', nest: 'log' },
  { key: 'debug', nest: 'debug' },
  { key: 'trace', nest: 'verbose' },
];

export const toNestLogLevels = (level: string | undefined): LogLevel[] => {
  const normalized = (level ?? 'info').trim().toLowerCase();
  const index = ORDERED.findIndex((item) => item.key === normalized);
  const cutoff = index === -1 ? ORDERED.findIndex((item) => item.key === 'info') : index;
  return ORDERED.slice(0, cutoff + 1).map((item) => item.nest);
};
