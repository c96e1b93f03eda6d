type Listener<T> = (payload: T) => void;

type ListenerTable<Events> = { [K in keyof Events]?: Set<Listener<Events[K]>> };

/**
 * Minimal synchronous emitter keyed by an event map. A throwing listener
 * propagates to the emitter's caller.
 */
export class TypedEmitter<Events extends Record<string, unknown>> {
	private readonly listeners: ListenerTable<Events> = {};

	on<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): () => void {
		const set = this.listeners[event] ?? new Set<Listener<Events[K]>>();
		set.add(listener);
		this.listeners[event] = set;
		return () => this.off(event, listener);
	}

	off<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): void {
		this.listeners[event]?.delete(listener);
	}

	emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
		const set = this.listeners[event];
		if (!set) return;
		for (const listener of [...set]) listener(payload);
	}
}
