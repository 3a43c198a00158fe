export * from './lib/logwriter/index.js'
export { FacadeError, ReasonCode, hasReason, isFacadeError } from './lib/errors.js'
export { WriterRegistry, type WriterSummary } from './modules/writers/writer-registry.js'
export { createApp } from './app.js'
