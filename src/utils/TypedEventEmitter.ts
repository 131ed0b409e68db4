import { EventEmitter } from "node:events";

type EventMap<TEvents> = { [K in keyof TEvents]: (...args: never[]) => void };
type EventKey<TEvents> = Extract<keyof TEvents, string>;

/**
 * Node's EventEmitter behind an event-map-checked surface. Wrapped rather than
 * extended so the untyped overloads stay out of reach.
 */
export class TypedEventEmitter<TEvents extends EventMap<TEvents>> {
    private readonly emitter = new EventEmitter();

    on<K extends EventKey<TEvents>>(event: K, listener: TEvents[K]): this {
        this.emitter.on(event, listener);
        return this;
    }

    once<K extends EventKey<TEvents>>(event: K, listener: TEvents[K]): this {
        this.emitter.once(event, listener);
        return this;
    }

    off<K extends EventKey<TEvents>>(event: K, listener: TEvents[K]): this {
        this.emitter.off(event, listener);
        return this;
    }

    removeAllListeners<K extends EventKey<TEvents>>(event?: K): this {
        this.emitter.removeAllListeners(event);
        return this;
    }

    emit<K extends EventKey<TEvents>>(event: K, ...args: Parameters<TEvents[K]>): boolean {
        return this.emitter.emit(event, ...args);
    }

    listenerCount<K extends EventKey<TEvents>>(event: K): number {
        return this.emitter.listenerCount(event);
    }

    /**
     * Re-emit the given events on another emitter with the same event map
     */
    forward<K extends EventKey<TEvents>>(target: TypedEventEmitter<TEvents>, events: K[]): void {
        for (const event of events) {
            this.emitter.on(event, (...args: unknown[]) => {
                target.emitter.emit(event, ...args);
            });
        }
    }
}
