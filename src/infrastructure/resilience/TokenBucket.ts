/**
 * @wirebound/core - Retry Token Bucket
 *
 * Shared retry budget. Each retry takes tokens; a successful orchestration
 * returns the cost of its last retry. When the bucket runs dry, failures
 * are no longer retried until successes refill it.
 */

export const DEFAULT_BUCKET_CAPACITY = 500;
export const DEFAULT_RETRY_COST = 5;
export const DEFAULT_TIMEOUT_RETRY_COST = 10;

export interface TokenBucketOptions {
  /** @defaultValue 500 */
  capacity?: number;

  /** @defaultValue 5 */
  retryCost?: number;

  /** @defaultValue 10 */
  timeoutRetryCost?: number;
}

export class TokenBucket {
  readonly capacity: number;
  readonly retryCost: number;
  readonly timeoutRetryCost: number;
  private tokens: number;

  constructor(options: TokenBucketOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_BUCKET_CAPACITY;
    this.retryCost = options.retryCost ?? DEFAULT_RETRY_COST;
    this.timeoutRetryCost = options.timeoutRetryCost ?? DEFAULT_TIMEOUT_RETRY_COST;
    this.tokens = this.capacity;
  }

  /**
   * Take `cost` tokens. Returns false, taking nothing, when not enough remain.
   */
  tryAcquire(cost: number): boolean {
    if (cost > this.tokens) {
      return false;
    }
    this.tokens -= cost;
    return true;
  }

  /**
   * Return tokens, never exceeding capacity.
   */
  release(cost: number): void {
    this.tokens = Math.min(this.capacity, this.tokens + cost);
  }

  get available(): number {
    return this.tokens;
  }
}
