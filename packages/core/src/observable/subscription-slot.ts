import type { Subscription } from 'rxjs';

/**
 * Owns the single live subscription of a synchronizer.
 *
 * Every attach or resize calls {@link begin}, which cancels whatever is
 * held and hands out a new generation token. Async steps check
 * {@link isCurrent} with their token before publishing; a mismatch means a
 * newer request superseded them and the result is dropped. A subscription
 * opened under a stale token is unsubscribed on {@link hold}, so two
 * streams are never active at once.
 */
export class SubscriptionSlot {
  private generation = 0;
  private active: Subscription | null = null;
  private disposed = false;

  /**
   * Cancel the held subscription and start a new generation.
   */
  begin(): number {
    this.cancel();
    this.generation += 1;
    return this.generation;
  }

  /** Whether `token` still belongs to the latest request */
  isCurrent(token: number): boolean {
    return !this.disposed && token === this.generation;
  }

  /**
   * Adopt `subscription` for generation `token`.
   *
   * @returns false when the token is stale; the subscription is then closed
   */
  hold(token: number, subscription: Subscription): boolean {
    if (!this.isCurrent(token)) {
      subscription.unsubscribe();
      return false;
    }
    this.active?.unsubscribe();
    this.active = subscription;
    return true;
  }

  /** Whether a live subscription is currently held */
  get isActive(): boolean {
    return this.active !== null && !this.active.closed;
  }

  /** Unsubscribe the held subscription without starting a new generation */
  cancel(): void {
    this.active?.unsubscribe();
    this.active = null;
  }

  /** Cancel and invalidate every outstanding token */
  dispose(): void {
    this.disposed = true;
    this.generation += 1;
    this.cancel();
  }
}
