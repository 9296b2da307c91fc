/**
 * Hands out strictly increasing integer ids derived from timestamps.
 *
 * The candidate id is the timestamp scaled to the configured precision. When
 * several calls land on the same tick (or time goes backwards) the previous id
 * plus one is returned instead, so ids never repeat within one instance.
 */
export class NonceCreator {
  static readonly SECONDS_PRECISION = 1;
  static readonly MILLISECONDS_PRECISION = 1_000;
  static readonly MICROSECONDS_PRECISION = 1_000_000;

  private lastTrackingNonce = 0;

  constructor(
    private readonly precision: number,
    private readonly clock: () => number = () => Date.now() / 1000,
  ) {}

  static forSeconds(): NonceCreator {
    return new NonceCreator(NonceCreator.SECONDS_PRECISION);
  }

  static forMicroseconds(): NonceCreator {
    return new NonceCreator(NonceCreator.MICROSECONDS_PRECISION);
  }

  /** @param timestamp seconds since epoch; defaults to now */
  getTrackingNonce(timestamp?: number): number {
    const seconds = timestamp ?? this.clock();
    const candidate = Math.round(seconds * this.precision);
    this.lastTrackingNonce =
      candidate > this.lastTrackingNonce ? candidate : this.lastTrackingNonce + 1;
    return this.lastTrackingNonce;
  }
}
