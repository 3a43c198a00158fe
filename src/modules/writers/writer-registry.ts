import type { LogWriter } from '../../lib/logwriter/log-writer.js'
import type { DestinationKind, WriterState } from '../../lib/logwriter/types.js'
import { notFound } from '../../lib/errors.js'

export interface WriterSummary {
  name: string
  kind: DestinationKind
  destination: string
  state: WriterState
  queuedMessages: number
  batchCount: number
}

/**
 * Named writers exposed through the monitoring routes.
 */
export class WriterRegistry {
  private readonly writers = new Map<string, LogWriter>()

  register(name: string, writer: LogWriter): void {
    if (this.writers.has(name)) {
      throw new Error(`writer already registered: ${name}`)
    }
    this.writers.set(name, writer)
  }

  unregister(name: string): boolean {
    return this.writers.delete(name)
  }

  /**
   * @throws ApiError (404) if no writer has that name
   */
  get(name: string): LogWriter {
    const writer = this.writers.get(name)
    if (!writer) {
      throw notFound(`Writer ${name} not found`)
    }
    return writer
  }

  entries(): Array<[string, LogWriter]> {
    return [...this.writers.entries()]
  }

  list(): WriterSummary[] {
    return this.entries().map(([name, writer]) => ({
      name,
      kind: writer.facade.kind,
      destination: writer.facade.destinationName,
      state: writer.state,
      queuedMessages: writer.messageQueue.size,
      batchCount: writer.batchCount,
    }))
  }

  get size(): number {
    return this.writers.size
  }
}
