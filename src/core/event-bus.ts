export type EventHandler<TEvent> = (event: TEvent) => void

export interface EventBus<TEvent> {
  publish(event: TEvent): void
  subscribe(handler: EventHandler<TEvent>): () => void
}

export class InMemoryEventBus<TEvent> implements EventBus<TEvent> {
  private readonly handlers = new Set<EventHandler<TEvent>>()

  /** `onHandlerError` sees subscriber failures; they never reach the publisher. */
  constructor(private readonly onHandlerError?: (error: unknown, event: TEvent) => void) {}

  publish(event: TEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event)
      } catch (error) {
        this.onHandlerError?.(error, event)
      }
    }
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }
}
