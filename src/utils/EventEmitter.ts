import { logger } from './Logger';

type EventMap<T> = { [K in keyof T]: unknown[] };
type Handler<A extends unknown[]> = (...args: A) => void;

/**
 * A tiny, type-safe event emitter.
 *
 * Event names and argument tuples are checked at compile time, and an
 * exception in one listener does not stop the others from running.
 *
 * @example
 * ```typescript
 * interface MyEvents { data: [string]; error: [Error] }
 * const emitter = new EventEmitter<MyEvents>();
 * const unsub = emitter.on('data', (msg) => console.log(msg));
 * emitter.emit('data', 'hello');
 * unsub();
 * ```
 */
export class EventEmitter<T extends EventMap<T>> {
    private listeners: { [K in keyof T]?: Set<Handler<T[K]>> } = {};

    /**
     * Subscribe to an event.
     * @returns Unsubscribe function
     */
    on<K extends keyof T>(event: K, handler: Handler<T[K]>): () => void {
        let handlers = this.listeners[event];
        if (!handlers) {
            handlers = new Set();
            this.listeners[event] = handlers;
        }
        handlers.add(handler);
        return () => this.off(event, handler);
    }

    off<K extends keyof T>(event: K, handler: Handler<T[K]>): void {
        this.listeners[event]?.delete(handler);
    }

    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                logger.error(`[EventEmitter] Error in listener for ${String(event)}:`, err);
            }
        }
    }

    /**
     * Subscribe to an event once.
     */
    once<K extends keyof T>(event: K, handler: Handler<T[K]>): () => void {
        const wrapper = (...args: T[K]) => {
            this.off(event, wrapper);
            handler(...args);
        };
        return this.on(event, wrapper);
    }

    listenerCount<K extends keyof T>(event: K): number {
        return this.listeners[event]?.size ?? 0;
    }

    removeAllListeners(): void {
        this.listeners = {};
    }
}
