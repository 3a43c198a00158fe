import { Router, type Request, type Response } from 'express'
import httpStatus from 'http-status'
import type { WriterRegistry } from './writer-registry.js'

/**
 * Read-only monitoring routes for registered writers.
 */
export function createWritersRouter(registry: WriterRegistry): Router {
  const router = Router()

  router.get('/', (_req: Request, res: Response) => {
    res.status(httpStatus.OK).json({ writers: registry.list() })
  })

  router.get('/:name/stats', (req: Request, res: Response) => {
    // throws a 404 ApiError for unknown names; express forwards it to the error handler
    const writer = registry.get(req.params.name)

    res.status(httpStatus.OK).json({
      name: req.params.name,
      state: writer.state,
      statistics: writer.statistics.snapshot(),
    })
  })

  return router
}
