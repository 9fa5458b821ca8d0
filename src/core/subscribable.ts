/**
 * subscribable.ts
 *
 * Base class for the observer pattern used throughout the system.
 *
 * Paginator, PaginatorCache and their subclasses extend Subscribable so any
 * UI layer (or a plain script) can watch them through a callback list rather
 * than a framework-specific rebuild hook.
 *
 * - Listeners are stored in a Set: O(1) add/remove, and subscribing the same
 *   function twice is a no-op.
 * - subscribe() returns an unsubscribe function.
 * - onSubscribe / onUnsubscribe are protected hooks subclasses override to
 *   start or stop side-effects while listeners exist.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-function-type
export class Subscribable<TListener extends Function = () => void> {
  /** The set of currently registered listener functions. */
  protected listeners: Set<TListener>

  constructor() {
    this.listeners = new Set<TListener>()
    // Stable reference so it can be handed to useSyncExternalStore directly.
    this.subscribe = this.subscribe.bind(this)
  }

  /**
   * Register a listener.
   *
   * @returns An unsubscribe function that also triggers onUnsubscribe.
   */
  subscribe(listener: TListener): () => void {
    this.listeners.add(listener)
    this.onSubscribe()

    return () => {
      this.listeners.delete(listener)
      this.onUnsubscribe()
    }
  }

  /** Returns true if there is at least one active listener. */
  hasListeners(): boolean {
    return this.listeners.size > 0
  }

  /** Called every time a listener is added via subscribe(). */
  protected onSubscribe(): void {
    // No-op by default
  }

  /**
   * Called every time a listener is removed. Fires on every removal, not only
   * the last; check `!this.hasListeners()` to react to active → inactive.
   */
  protected onUnsubscribe(): void {
    // No-op by default
  }
}
