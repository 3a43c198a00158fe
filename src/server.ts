import { createInterface } from 'node:readline'
import { logger, fatal, info } from './lib/logger.js'
import { bootstrap } from './config/env.js'
import { createApp } from './app.js'
import { LogMessage } from './lib/logwriter/log-message.js'
import { createLogWriter, writerOptionsFromEnv } from './lib/logwriter/writer-factory.js'
import { WriterRegistry } from './modules/writers/writer-registry.js'

const SHUTDOWN_TIMEOUT = 30000

async function main() {
  try {
    logger.info('Bootstrapping configuration...')
    const env = bootstrap()

    const writer = createLogWriter(writerOptionsFromEnv(env))
    const registry = new WriterRegistry()
    registry.register(env.DESTINATION, writer)

    writer.start()
    if (!(await writer.initialize())) {
      fatal('Log writer failed to initialize', { event: 'RunnerStartupFailed' })
      process.exit(1)
    }

    const app = createApp(registry)
    const server = app.listen(env.PORT, () => {
      info('Server started', { event: 'RunnerStarted', metadata: { port: env.PORT, destination: env.DESTINATION } })
    })

    // Each line on stdin becomes one log message
    const input = createInterface({ input: process.stdin, crlfDelay: Infinity })
    let pending: Promise<void> = Promise.resolve()
    input.on('line', (line) => {
      pending = pending.then(() => writer.addMessage(new LogMessage(Date.now(), line)))
    })

    let shuttingDown = false
    const shutdown = async (reason: string) => {
      if (shuttingDown) return
      shuttingDown = true
      info('Shutdown requested', { event: 'RunnerShutdown', metadata: { reason } })

      // Force exit after timeout
      setTimeout(() => {
        logger.error('Forced shutdown after timeout')
        process.exit(1)
      }, SHUTDOWN_TIMEOUT).unref()

      input.close()
      await pending

      writer.stop()
      const stopped = await writer.waitUntilStopped(SHUTDOWN_TIMEOUT)

      server.close(() => {
        info('Graceful shutdown completed', {
          event: 'RunnerStopped',
          metadata: { writerStopped: stopped, statistics: writer.statistics.snapshot() },
        })
        process.exit(stopped ? 0 : 1)
      })
    }

    // Register shutdown handlers
    process.on('SIGTERM', () => void shutdown('SIGTERM'))
    process.on('SIGINT', () => void shutdown('SIGINT'))
    input.on('close', () => void shutdown('end of input'))

    process.on('unhandledRejection', (reason: unknown) => {
      fatal('Unhandled rejection', { err: reason })
      void shutdown('unhandledRejection')
    })
  } catch (error) {
    fatal('Failed to start server', { err: error })
    process.exit(1)
  }
}

void main()
