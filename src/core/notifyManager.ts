/**
 * notifyManager.ts
 *
 * Batches and schedules deferred notifications.
 *
 * A single page arrival produces several notifications: the paginator's own
 * listeners and the owning PaginatorCache's event subscribers. Work scheduled
 * through schedule() inside a batch() is collected and flushed together once
 * the outermost batch closes, so a UI adapter renders once per transition.
 *
 * Listeners registered directly on a Paginator run synchronously inside the
 * batch; only callbacks wrapped with batchCalls() (the React adapter's
 * onStoreChange) are deferred.
 *
 * Customisation points:
 *   - setScheduler()           – replace setTimeout with a custom scheduler
 *   - setNotifyFunction()      – wrap individual notification calls
 *   - setBatchNotifyFunction() – wrap the entire flush
 */

type NotifyCallback = () => void
type NotifyFunction = (callback: NotifyCallback) => void
type BatchNotifyFunction = (callback: NotifyCallback) => void
type ScheduleFunction = (callback: NotifyCallback) => void

function createNotifyManager() {
  /** Pending callbacks accumulated while a transaction is open. */
  let queue: NotifyCallback[] = []

  /** Nesting depth of open batch() calls. */
  let transactions = 0

  let notifyFn: NotifyFunction = (callback) => callback()
  let batchNotifyFn: BatchNotifyFunction = (callback) => callback()

  /** Default: next macrotask, after the current stack and its microtasks. */
  let scheduleFn: ScheduleFunction = (cb) => setTimeout(cb, 0)

  /**
   * Drain the queue. Takes a snapshot so notifications scheduled during the
   * flush land in the next pass.
   */
  function flush(): void {
    const localQueue = queue
    queue = []
    if (!localQueue.length) return
    scheduleFn(() => {
      batchNotifyFn(() => {
        localQueue.forEach((callback) => {
          notifyFn(callback)
        })
      })
    })
  }

  /**
   * Open a notification transaction. schedule() calls made synchronously
   * inside `callback` are queued and flushed when the outermost batch ends.
   */
  function batch<T>(callback: () => T): T {
    transactions++
    try {
      return callback()
    } finally {
      transactions--
      if (!transactions) {
        flush()
      }
    }
  }

  /** Queue a callback inside a transaction, or schedule it on its own. */
  function schedule(callback: NotifyCallback): void {
    if (transactions) {
      queue.push(callback)
    } else {
      scheduleFn(() => {
        batchNotifyFn(() => {
          notifyFn(callback)
        })
      })
    }
  }

  /**
   * Wrap a callback so every invocation goes through schedule().
   *
   * @example
   * paginator.subscribe(notifyManager.batchCalls(onStoreChange))
   */
  function batchCalls<T extends (...args: Array<unknown>) => unknown>(
    callback: T,
  ): T {
    return ((...args: Parameters<T>) => {
      schedule(() => {
        callback(...args)
      })
    }) as T
  }

  function setNotifyFunction(fn: NotifyFunction): void {
    notifyFn = fn
  }

  function setBatchNotifyFunction(fn: BatchNotifyFunction): void {
    batchNotifyFn = fn
  }

  function setScheduler(fn: ScheduleFunction): void {
    scheduleFn = fn
  }

  return {
    batch,
    batchCalls,
    flush,
    schedule,
    setNotifyFunction,
    setBatchNotifyFunction,
    setScheduler,
  }
}

/** Shared instance used by every paginator and cache. */
export const notifyManager = createNotifyManager()
