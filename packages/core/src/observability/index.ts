export { getStoreTracer, finishSpan, traceStoreOperation } from './tracing.js';
export type { StoreOperation } from './tracing.js';
