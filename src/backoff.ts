export interface ExponentialBackoffOptions {
  /**
   * Delay applied before the first retry attempt in milliseconds.
   */
  initialDelayMs: number;
  /**
   * Growth factor applied on every subsequent retry. Defaults to 2 (doubling).
   */
  factor?: number;
  /**
   * Cap for the computed delay, applied before jitter. Defaults to 60 seconds.
   */
  maxDelayMs?: number;
  /**
   * Maximum jitter as a fraction of the capped delay, applied in both
   * directions. Must be < 1. Defaults to 0.25 (±25%).
   */
  jitterRatio?: number;
  /**
   * Custom random generator used to compute jitter. Defaults to Math.random.
   */
  random?: () => number;
}

export const DEFAULT_MAX_DELAY_MS = 60_000;
export const DEFAULT_JITTER_RATIO = 0.25;

function validatePositiveFinite(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new TypeError(`${name} must be a finite number greater than 0`);
  }
}

function applyJitter(value: number, random: () => number, jitterRatio: number): number {
  if (jitterRatio === 0) {
    return value;
  }

  // Uniform in [-jitterRatio, +jitterRatio).
  const offset = (random() * 2 - 1) * jitterRatio;
  return value * (1 + offset);
}

export class ExponentialBackoff {
  private readonly initialDelayMs: number;
  private readonly factor: number;
  private readonly maxDelayMs: number;
  private readonly jitterRatio: number;
  private readonly random: () => number;

  private attempt = 0;

  constructor(options: ExponentialBackoffOptions) {
    validatePositiveFinite("initialDelayMs", options.initialDelayMs);

    const factor = options.factor ?? 2;
    if (!Number.isFinite(factor) || factor < 1) {
      throw new TypeError("factor must be a finite number greater than or equal to 1");
    }

    const maxDelayMs = options.maxDelayMs ?? Math.max(DEFAULT_MAX_DELAY_MS, options.initialDelayMs);
    validatePositiveFinite("maxDelayMs", maxDelayMs);
    if (maxDelayMs < options.initialDelayMs) {
      throw new TypeError("maxDelayMs must be greater than or equal to initialDelayMs");
    }

    const jitterRatio = options.jitterRatio ?? DEFAULT_JITTER_RATIO;
    if (!Number.isFinite(jitterRatio) || jitterRatio < 0 || jitterRatio >= 1) {
      throw new TypeError("Invalid jitter ratio: require 0 <= ratio < 1");
    }

    this.initialDelayMs = options.initialDelayMs;
    this.factor = factor;
    this.maxDelayMs = maxDelayMs;
    this.jitterRatio = jitterRatio;
    this.random = options.random ?? Math.random;
  }

  /**
   * Returns the next delay in the backoff sequence, applying jitter.
   */
  nextDelay(): number {
    this.attempt += 1;
    return this.computeDelayForAttempt(this.attempt);
  }

  /**
   * Resets the internal attempt counter to the initial state.
   */
  reset(): void {
    this.attempt = 0;
  }

  /**
   * Delay before the given retry (1-based), without advancing the sequence.
   */
  computeDelayForAttempt(retry: number): number {
    const exponential = this.initialDelayMs * Math.pow(this.factor, retry - 1);
    const capped = Math.min(exponential, this.maxDelayMs);
    const jittered = applyJitter(capped, this.random, this.jitterRatio);

    return Math.max(1, Math.round(jittered));
  }
}
