import { Router, type Request, type Response } from 'express'
import httpStatus from 'http-status'
import { WriterState } from '../../lib/logwriter/types.js'
import type { WriterRegistry } from '../writers/writer-registry.js'

interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy'
  timestamp: string
  uptime: number
  memory: {
    used: number
    total: number
    percentage: number
  }
  writers: Record<string, { state: WriterState; queuedMessages: number }>
}

const HEALTHY_STATES: ReadonlySet<WriterState> = new Set([WriterState.READY, WriterState.RUNNING])

export function createHealthRouter(registry: WriterRegistry): Router {
  const router = Router()

  router.get('/', (_req: Request, res: Response) => {
    const summaries = registry.list()
    const healthyCount = summaries.filter((writer) => HEALTHY_STATES.has(writer.state)).length

    // Memory metrics
    const memUsage = process.memoryUsage()
    const memUsed = memUsage.heapUsed
    const memTotal = memUsage.heapTotal

    const status: HealthStatus = {
      status:
        healthyCount === summaries.length ? 'healthy' : healthyCount > 0 ? 'degraded' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      memory: {
        used: memUsed,
        total: memTotal,
        percentage: Math.round((memUsed / memTotal) * 100),
      },
      writers: Object.fromEntries(
        summaries.map((writer) => [writer.name, { state: writer.state, queuedMessages: writer.queuedMessages }])
      ),
    }

    res.status(status.status === 'unhealthy' ? httpStatus.SERVICE_UNAVAILABLE : httpStatus.OK).json(status)
  })

  // Simple liveness probe (doesn't check writers)
  router.get('/live', (_req: Request, res: Response) => {
    res.status(httpStatus.OK).json({ status: 'alive' })
  })

  // Ready once every writer has finished initializing successfully
  router.get('/ready', (_req: Request, res: Response) => {
    const ready = registry.list().every((writer) => HEALTHY_STATES.has(writer.state))

    if (ready) {
      res.status(httpStatus.OK).json({ status: 'ready' })
    } else {
      res.status(httpStatus.SERVICE_UNAVAILABLE).json({ status: 'not ready' })
    }
  })

  return router
}
