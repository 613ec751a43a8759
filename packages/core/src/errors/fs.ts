import { CancelledError, CorpusError, IOError, NotFoundError, TimeoutError } from './catalog.js'

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string'
}

/** True for the DOMException raised by AbortSignal.timeout() */
export function isTimeoutAbort(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError'
}

export function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')
}

/**
 * Throws a TimeoutError or CancelledError when the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (!signal?.aborted) return
  if (isTimeoutAbort(signal.reason)) {
    throw new TimeoutError(`${operation} timed out`)
  }
  throw new CancelledError(`${operation} was cancelled`)
}

/**
 * Maps a filesystem or abort error onto the error catalog. Errors that are
 * already CorpusErrors pass through unchanged.
 */
export function toCorpusError(err: unknown, path: string, operation: string): CorpusError {
  if (err instanceof CorpusError) return err
  if (isTimeoutAbort(err)) {
    return new TimeoutError(`${operation} timed out`, { path })
  }
  if (isAbort(err)) {
    return new CancelledError(`${operation} was cancelled`, { path })
  }
  if (isErrnoException(err)) {
    if (err.code === 'ENOENT') {
      return new NotFoundError(`Path not found: ${path}`, { path })
    }
    return new IOError(`${operation} failed: ${err.message}`, { path, errno: err.code })
  }
  const message = err instanceof Error ? err.message : String(err)
  return new IOError(`${operation} failed: ${message}`, { path })
}
