export { writeFileAtomic, writeFilesAtomic } from './atomic.js'
export type { AtomicWriteEntry, AtomicWriteOptions, AtomicWriteResult } from './atomic.js'
