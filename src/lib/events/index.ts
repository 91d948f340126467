import { EventEmitter } from "eventemitter3";

/**
 * Event map keyed by event name; each value is the listener's argument tuple.
 * Example: { positionChanged: [PositionChangedEvent]; halted: [] }
 */
export type EventMap = Record<string, readonly unknown[]>;

export type Listener<Args extends readonly unknown[]> = (...args: Args) => void;

/** Invoked when a listener throws; the remaining listeners still run. */
export type ListenerErrorCallback = (error: unknown, event: string) => void;

/**
 * Type-safe event emitter wrapping eventemitter3.
 *
 * A throwing listener never propagates into `emit()`: events are published
 * after state has been committed, so a faulty subscriber must not make a
 * committed operation look failed.
 *
 * @example
 * ```ts
 * type Events = { settled: [receipt: SettlementReceipt] };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("settled", (receipt) => audit(receipt));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly wrapped = new Map<string, Map<unknown, (...args: unknown[]) => void>>();
	private readonly onListenerError: ListenerErrorCallback | null;

	constructor(onListenerError?: ListenerErrorCallback) {
		this.onListenerError = onListenerError ?? null;
	}

	/** Registers a listener. */
	on<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): this {
		this.ee.on(event, this.wrap(event, listener, false));
		return this;
	}

	/** Registers a listener that auto-removes after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): this {
		this.ee.once(event, this.wrap(event, listener, true));
		return this;
	}

	/** Removes a previously registered listener. */
	off<K extends keyof TEvents & string>(event: K, listener: Listener<TEvents[K]>): this {
		const byListener = this.wrapped.get(event);
		const fn = byListener?.get(listener);
		if (byListener && fn) {
			this.ee.off(event, fn);
			byListener.delete(listener);
		}
		return this;
	}

	/** Emits an event; returns true if it had listeners. */
	emit<K extends keyof TEvents & string>(event: K, ...args: TEvents[K]): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Removes all listeners for one event, or for every event. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
			this.wrapped.delete(event);
		} else {
			this.ee.removeAllListeners();
			this.wrapped.clear();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	private wrap<Args extends readonly unknown[]>(
		event: string,
		listener: Listener<Args>,
		once: boolean,
	): (...args: unknown[]) => void {
		const byListener = this.wrapped.get(event) ?? new Map<unknown, (...args: unknown[]) => void>();
		this.wrapped.set(event, byListener);

		const fn = (...args: unknown[]): void => {
			if (once) byListener.delete(listener);
			try {
				Reflect.apply(listener, undefined, args);
			} catch (error: unknown) {
				this.onListenerError?.(error, event);
			}
		};
		byListener.set(listener, fn);
		return fn;
	}
}
