/**
 * removable.ts
 *
 * Base class for observables that a PaginatorCache can collect after they
 * have been idle (no listeners) for `gcTime` milliseconds.
 *
 * Lifecycle:
 *   1. Last listener unsubscribes → subclass calls scheduleGc()
 *   2. gcTime ms later → optionalRemove() runs
 *   3. optionalRemove() re-checks that removal is still safe
 *   4. A new listener before the timeout → subclass calls clearGcTimeout()
 *
 * A standalone paginator keeps gcTime at Infinity, so no timer is ever set
 * and nothing outlives the owner.
 */

import { Subscribable } from './subscribable'
import { isValidTimeout } from './utils'

// eslint-disable-next-line @typescript-eslint/no-unsafe-function-type
export abstract class Removable<TListener extends Function = () => void> extends Subscribable<TListener> {
  /** Idle period (ms) before optionalRemove(). Infinity disables collection. */
  gcTime: number = Infinity

  #gcTimeout?: ReturnType<typeof setTimeout>

  /** Cancel any pending collection. Subclasses extend this to release work. */
  destroy(): void {
    this.clearGcTimeout()
  }

  /** Start (or restart) the collection countdown. */
  protected scheduleGc(): void {
    this.clearGcTimeout()
    if (isValidTimeout(this.gcTime)) {
      this.#gcTimeout = setTimeout(() => {
        this.#gcTimeout = undefined
        this.optionalRemove()
      }, this.gcTime)
    }
  }

  protected clearGcTimeout(): void {
    if (this.#gcTimeout !== undefined) {
      clearTimeout(this.#gcTimeout)
      this.#gcTimeout = undefined
    }
  }

  /** Whether a collection timer is currently pending. */
  isGcScheduled(): boolean {
    return this.#gcTimeout !== undefined
  }

  /** Remove this instance from its owner if it is still safe to do so. */
  protected abstract optionalRemove(): void
}
