import EventEmitter from "eventemitter3";

/**
 * Generic typed event map -- keys are event names, values are handler signatures.
 * Example: { position_opened: (e: PositionOpened) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

type Listener = (...args: unknown[]) => void;

export interface TypedEmitterOptions {
	/**
	 * Called when a listener throws; the remaining listeners still run.
	 * Without it, a listener error propagates out of `emit()`.
	 */
	readonly onListenerError?: (event: string, error: unknown) => void;
}

/**
 * Type-safe event emitter over eventemitter3.
 *
 * With `onListenerError` set, listeners are isolated from each other and
 * from the emitter: a throwing listener is reported and never propagates
 * out of `emit()`.
 *
 * @example
 * ```ts
 * type Events = { deposited: (amount: bigint) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("deposited", (amount) => console.log(amount));
 * emitter.emit("deposited", 1_000n);
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly guards = new Map<string, Map<unknown, Listener>>();
	private readonly onListenerError: ((event: string, error: unknown) => void) | undefined;

	constructor(options: TypedEmitterOptions = {}) {
		this.onListenerError = options.onListenerError;
	}

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, this.guard(event, handler, false));
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		const guarded = this.guards.get(event)?.get(handler);
		if (guarded) {
			this.ee.off(event, guarded);
			this.guards.get(event)?.delete(handler);
		}
		return this;
	}

	/** Registers a handler that is removed after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, this.guard(event, handler, true));
		return this;
	}

	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Removes all listeners for one event, or for every event. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
			this.guards.delete(event);
		} else {
			this.ee.removeAllListeners();
			this.guards.clear();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	private guard(event: string, handler: Listener, once: boolean): Listener {
		const guarded: Listener = (...args) => {
			if (once) this.guards.get(event)?.delete(handler);
			const report = this.onListenerError;
			if (!report) {
				handler(...args);
				return;
			}
			try {
				handler(...args);
			} catch (error) {
				report(event, error);
			}
		};
		let byHandler = this.guards.get(event);
		if (!byHandler) {
			byHandler = new Map();
			this.guards.set(event, byHandler);
		}
		byHandler.set(handler, guarded);
		return guarded;
	}
}
