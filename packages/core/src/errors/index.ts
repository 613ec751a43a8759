export {
  CorpusError,
  ValidationError,
  NotFoundError,
  ConflictError,
  DecodeError,
  CancelledError,
  IOError,
  TimeoutError,
} from './catalog.js'
export {
  isErrnoException,
  isAbort,
  isTimeoutAbort,
  throwIfAborted,
  toCorpusError,
} from './fs.js'
