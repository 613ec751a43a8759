export { runBatch, type BatchOptions, type BatchOutcome } from './run.js'
