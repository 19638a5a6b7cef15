/**
 * Event bus for bar store writes.
 *
 * Emits an event when a bar becomes final, so detection can score it as
 * soon as it is stored instead of waiting for the next periodic pass.
 */

import type { Logger } from '@barwatch/logger'
import type { StoredBar } from '@barwatch/contracts'

/**
 * Event emitted when an upsert stores a final bar.
 */
export interface BarFinalizedEvent {
  bar: StoredBar

  /**
   * - 'inserted': the bar arrived already final
   * - 'finalized': an open bar was replaced by its final version
   */
  transition: 'inserted' | 'finalized'

  /**
   * Unix timestamp (ms) when the store emitted the event.
   */
  emittedAt: number
}

export type StoreEventType = 'finalized'

/**
 * Listeners may be async. A rejected promise or a thrown error is logged
 * and does not reach the writer or the other listeners.
 */
export type BarFinalizedListener = (event: BarFinalizedEvent) => void | Promise<void>

/**
 * Pub-sub for store events.
 *
 * Example:
 * ```typescript
 * const events = new StoreEventBus(logger)
 *
 * const unsubscribe = events.on('finalized', async ({ bar }) => {
 *   await engine.scoreBar(bar)
 * })
 *
 * // Later: stop listening
 * unsubscribe()
 * ```
 */
export class StoreEventBus {
  private listeners = new Map<StoreEventType, BarFinalizedListener[]>()

  constructor(private logger?: Logger) {}

  /**
   * @returns Unsubscribe function
   */
  on(eventType: StoreEventType, listener: BarFinalizedListener): () => void {
    const eventListeners = this.listeners.get(eventType) ?? []
    eventListeners.push(listener)
    this.listeners.set(eventType, eventListeners)

    return () => {
      this.off(eventType, listener)
    }
  }

  off(eventType: StoreEventType, listener: BarFinalizedListener): void {
    const eventListeners = this.listeners.get(eventType) ?? []
    const index = eventListeners.indexOf(listener)
    if (index !== -1) {
      eventListeners.splice(index, 1)
    }

    if (eventListeners.length === 0) {
      this.listeners.delete(eventType)
    }
  }

  /**
   * Invokes every listener synchronously; async listeners run on their own.
   */
  emit(eventType: StoreEventType, event: BarFinalizedEvent): void {
    const eventListeners = [...(this.listeners.get(eventType) ?? [])]

    for (const listener of eventListeners) {
      try {
        const result = listener(event)
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportListenerError(eventType, error))
        }
      } catch (error) {
        this.reportListenerError(eventType, error)
      }
    }
  }

  listenerCount(eventType: StoreEventType): number {
    return this.listeners.get(eventType)?.length ?? 0
  }

  removeAllListeners(): void {
    this.listeners.clear()
  }

  private reportListenerError(eventType: StoreEventType, error: unknown): void {
    this.logger?.error('Store event listener failed', {
      event: eventType,
      error: error instanceof Error ? error.message : String(error),
    })
  }
}
