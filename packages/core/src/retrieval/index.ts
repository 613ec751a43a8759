export { createRetrievalService } from './service.js'
export type {
  CollectionSession,
  CollectionSummary,
  FileSlice,
  LineRange,
  RetrievalService,
  RetrievalServiceDeps,
} from './service.js'
