/**
 * Engine Events
 * Event emitter for trimmer gesture events and state notifications.
 */

import { createLogger } from '../utils/logger';

const logger = createLogger('EngineEvents');

/**
 * Simple event emitter; a throwing listener does not stop the others.
 */
export class EngineEventEmitter<TEvent> {
  private listeners: Set<(event: TEvent) => void> = new Set();

  /**
   * Subscribe to events.
   * @returns Unsubscribe function
   */
  on(callback: (event: TEvent) => void): () => void {
    this.listeners.add(callback);
    return () => this.listeners.delete(callback);
  }

  /**
   * Emit an event to all listeners.
   */
  emit(event: TEvent): void {
    for (const callback of this.listeners) {
      try {
        callback(event);
      } catch (err) {
        logger.error('Event listener error', { error: err });
      }
    }
  }

  /**
   * Remove all listeners.
   */
  clear(): void {
    this.listeners.clear();
  }

  /**
   * Get the number of listeners.
   */
  get listenerCount(): number {
    return this.listeners.size;
  }
}
