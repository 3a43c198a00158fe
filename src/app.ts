import express, { type Express } from 'express'

import { errorHandler, notFoundHandler } from './middleware/error-handler.js'
import { WriterRegistry } from './modules/writers/writer-registry.js'

// Routes
import { createHealthRouter } from './modules/health/health.routes.js'
import { createWritersRouter } from './modules/writers/writers.routes.js'

export function createApp(registry: WriterRegistry = new WriterRegistry()): Express {
  const app = express()

  app.disable('x-powered-by')

  // Health check routes
  app.use('/health', createHealthRouter(registry))

  // Writer monitoring (read-only)
  app.use('/writers', createWritersRouter(registry))

  // 404 handler
  app.use(notFoundHandler)

  // Error handler (must be last)
  app.use(errorHandler)

  return app
}
