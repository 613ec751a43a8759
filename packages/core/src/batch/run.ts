import { CancelledError } from '../errors/catalog.js'
import { throwIfAborted } from '../errors/fs.js'

export type BatchOutcome<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: Error }

export interface BatchOptions<T = unknown, R = unknown> {
  /** Jobs running at once (at least 1) */
  concurrency: number
  /** Stop scheduling after the first failure and reject with it */
  failFast?: boolean
  signal?: AbortSignal
  /** Called as each job settles, in completion order */
  onSettled?: (outcome: BatchOutcome<T, R>, index: number) => void
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Run `worker` over `items` with at most `concurrency` jobs in flight.
 * Outcomes come back in input order. Each job gets a signal that fires when
 * the caller aborts or, under failFast, when another job has failed.
 */
export async function runBatch<T, R>(
  items: readonly T[],
  worker: (item: T, signal: AbortSignal) => Promise<R>,
  options: BatchOptions<T, R>,
): Promise<BatchOutcome<T, R>[]> {
  const controller = new AbortController()
  const onAbort = () => controller.abort(options.signal?.reason)
  options.signal?.addEventListener('abort', onAbort, { once: true })
  if (options.signal?.aborted) onAbort()

  const outcomes = new Array<BatchOutcome<T, R>>(items.length)
  let next = 0
  let firstFailure: Error | undefined

  const lane = async (): Promise<void> => {
    while (next < items.length && !controller.signal.aborted) {
      const index = next++
      const item = items[index]
      let outcome: BatchOutcome<T, R>
      try {
        outcome = { item, ok: true, value: await worker(item, controller.signal) }
      } catch (err) {
        outcome = { item, ok: false, error: toError(err) }
        if (options.failFast && !firstFailure) {
          firstFailure = outcome.error
          controller.abort(new CancelledError('Batch stopped after a failure'))
        }
      }
      outcomes[index] = outcome
      options.onSettled?.(outcome, index)
    }
  }

  try {
    const lanes = Math.max(1, Math.min(options.concurrency, items.length))
    await Promise.all(Array.from({ length: lanes }, lane))
  } finally {
    options.signal?.removeEventListener('abort', onAbort)
  }

  if (firstFailure) throw firstFailure
  throwIfAborted(options.signal, 'Batch')
  return outcomes
}
