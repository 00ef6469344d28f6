import {errorMessage} from './errors.js'

export type EventHandler<TEvent> = (event: TEvent) => void

export interface EventBus<TEvent> {
  publish(event: TEvent): void
  subscribe(handler: EventHandler<TEvent>): () => void
}

type InMemoryEventBusOptions = {
  /** Receives errors thrown by handlers. Defaults to a process warning; publishing never fails. */
  onHandlerError?: (error: unknown) => void
}

function warnHandlerError(error: unknown): void {
  process.emitWarning(`Event handler failed: ${errorMessage(error)}`)
}

export class InMemoryEventBus<TEvent> implements EventBus<TEvent> {
  private readonly handlers = new Set<EventHandler<TEvent>>()
  private readonly onHandlerError: (error: unknown) => void

  constructor(options: InMemoryEventBusOptions = {}) {
    this.onHandlerError = options.onHandlerError ?? warnHandlerError
  }

  publish(event: TEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event)
      } catch (error) {
        this.onHandlerError(error)
      }
    }
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }

  get size(): number {
    return this.handlers.size
  }
}
