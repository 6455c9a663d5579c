/**
 * A write to shared storage made by another writer (another tab, another process).
 */
export interface StorageChange {
	/** Changed key, or null when the whole storage was cleared */
	key: string | null;
	/** New value, or null when the key was removed */
	newValue: string | null;
}

export type StorageChangeHandler = (change: StorageChange) => void;

/**
 * Publish/subscribe channel for writes made outside the current document.
 */
export interface ChangeBus {
	/**
	 * @returns a function that removes the handler
	 */
	subscribe(handler: StorageChangeHandler): () => void;
}

/**
 * ChangeBus over the browser's `storage` event. Browsers fire it only in documents other than the
 * one that wrote, so a tab never sees its own writes.
 */
export class WindowStorageChangeBus implements ChangeBus {
	constructor(private readonly target: Pick<Window, "addEventListener" | "removeEventListener"> = window) {}

	subscribe(handler: StorageChangeHandler): () => void {
		const listener = (event: StorageEvent) => {
			handler({ key: event.key, newValue: event.newValue });
		};
		this.target.addEventListener("storage", listener);
		return () => {
			this.target.removeEventListener("storage", listener);
		};
	}
}

/**
 * ChangeBus driven by explicit {@link publish} calls, for targets without storage events.
 */
export class InProcessChangeBus implements ChangeBus {
	private readonly handlers = new Set<StorageChangeHandler>();

	subscribe(handler: StorageChangeHandler): () => void {
		this.handlers.add(handler);
		return () => {
			this.handlers.delete(handler);
		};
	}

	publish(change: StorageChange): void {
		for (const handler of Array.from(this.handlers)) {
			handler(change);
		}
	}

	get size(): number {
		return this.handlers.size;
	}
}
