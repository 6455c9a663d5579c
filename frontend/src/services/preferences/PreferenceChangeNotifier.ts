import { getLog } from "../../util/Logger";
import type { ChangeBus, StorageChange } from "./ChangeBus";
import { parsePreferenceRecord } from "./PreferenceRecord";
import { sanitizePreferences } from "./PreferencesRegistry";
import type { PreferenceMap } from "./PreferencesTypes";

const log = getLog(import.meta);

/**
 * Callback type for preference change listeners.
 */
export type PreferenceChangeCallback = (preferences: PreferenceMap) => void;

/**
 * Turns writes of the durable preference record by other writers into full preference maps.
 *
 * No retry or ordering beyond the bus's own: rapid writes elsewhere may arrive as the last value only.
 */
export class PreferenceChangeNotifier {
	private readonly callbacks = new Set<PreferenceChangeCallback>();
	private unsubscribeBus: (() => void) | undefined;

	constructor(
		private readonly bus: ChangeBus,
		private readonly storageKey: string,
	) {}

	/**
	 * Registers a callback for changes of the durable record.
	 *
	 * @returns Unsubscribe function
	 */
	onChange(callback: PreferenceChangeCallback): () => void {
		if (!this.unsubscribeBus) {
			this.unsubscribeBus = this.bus.subscribe(change => this.handleChange(change));
		}
		this.callbacks.add(callback);
		return () => {
			this.callbacks.delete(callback);
		};
	}

	/**
	 * Detaches from the bus and drops every callback.
	 */
	destroy(): void {
		this.unsubscribeBus?.();
		this.unsubscribeBus = undefined;
		this.callbacks.clear();
	}

	private handleChange(change: StorageChange): void {
		if (change.key !== this.storageKey || change.newValue === null) {
			return;
		}
		const parsed = parsePreferenceRecord(change.newValue);
		if (!parsed.success) {
			log.warn({ kind: parsed.error.kind }, "Ignoring preference change: %s", parsed.error.message);
			return;
		}
		const preferences = sanitizePreferences(parsed.value);
		for (const callback of Array.from(this.callbacks)) {
			try {
				callback(preferences);
			} catch (error) {
				log.warn(error, "Preference change listener threw");
			}
		}
	}
}
