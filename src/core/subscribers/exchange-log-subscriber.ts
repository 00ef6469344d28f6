import {appendFile, mkdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import type {ClientEvent} from '../events.js'

type ExchangeLogRecord = {
  ts: string
  sessionId: string
} & ClientEvent

/**
 * Appends every client event as one JSON line. Writes are chained so records land in
 * publish order; a failed write is counted and remembered but never thrown to the caller.
 */
export class ExchangeLogSubscriber {
  private pending: Promise<void> = Promise.resolve()
  private failures = 0
  private lastFailure?: unknown

  constructor(
    readonly logPath: string,
    readonly sessionId: string
  ) {}

  async handle(event: ClientEvent): Promise<void> {
    const record: ExchangeLogRecord = {ts: new Date().toISOString(), sessionId: this.sessionId, ...event}
    const next = this.pending.then(async () => {
      try {
        await mkdir(dirname(this.logPath), {recursive: true})
        await appendFile(this.logPath, `${JSON.stringify(record)}\n`, 'utf8')
      } catch (error) {
        this.failures += 1
        this.lastFailure = error
      }
    })
    this.pending = next
    await next
  }

  async flush(): Promise<void> {
    await this.pending
  }

  get failedWrites(): number {
    return this.failures
  }

  get lastError(): unknown {
    return this.lastFailure
  }
}
