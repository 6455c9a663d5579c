/**
 * Decides, once per page load, whether the identity service or the device is authoritative for
 * preferences, and serves reads and writes accordingly.
 *
 * Reads follow the chain server -> local -> defaults and always return a full map. Writes go to the
 * device first and then, for signed-in users, to the identity service. Degraded conditions
 * (offline, expired session, malformed records) are logged and never reach the caller; only
 * programmer errors throw.
 */

import { getLog } from "../../util/Logger";
import { type FallbackStep, resolveFallbackChain } from "./FallbackChain";
import type { LocalStore } from "./LocalPreferenceStore";
import type { PreferenceChangeCallback } from "./PreferenceChangeNotifier";
import { DEFAULT_PREFERENCES, isKnownKey, sanitizePreferences } from "./PreferencesRegistry";
import type {
	KnownPreferences,
	PreferenceKey,
	PreferenceMap,
	PreferenceValue,
	Strategy,
	StoredPreferences,
} from "./PreferencesTypes";
import { isPreferenceValue } from "./PreferencesTypes";
import type { RemoteStore } from "./RemotePreferenceStore";
import type { SessionDetector } from "./SessionProbe";
import { ok } from "mailhub-common";

const log = getLog(import.meta);

/**
 * The part of the change notifier the coordinator uses.
 */
export interface ChangeSubscriber {
	onChange(callback: PreferenceChangeCallback): () => void;
	destroy(): void;
}

export interface PreferenceCoordinatorDependencies {
	probe: SessionDetector;
	remote: RemoteStore;
	local: LocalStore;
	notifier: ChangeSubscriber;
}

type ReadSource = "server" | "local" | "defaults";

function assertPreferenceKey(key: unknown): asserts key is string {
	if (typeof key !== "string" || key.length === 0) {
		throw new TypeError(`Preference key must be a non-empty string, got ${typeof key}`);
	}
}

function assertPreferenceValue(key: string, value: unknown): asserts value is PreferenceValue {
	if (!isPreferenceValue(value)) {
		throw new TypeError(`Preference ${key} must be a boolean or a string, got ${typeof value}`);
	}
}

/**
 * @example
 * ```typescript
 * const coordinator = createPreferenceCoordinator();
 * await coordinator.initialize();
 *
 * const darkMode = await coordinator.get("darkMode");
 * await coordinator.set("language", "cs");
 * ```
 */
export class PreferenceCoordinator {
	private readonly probe: SessionDetector;
	private readonly remote: RemoteStore;
	private readonly local: LocalStore;
	private readonly notifier: ChangeSubscriber;
	private strategy: Strategy = "local";
	private initialized = false;
	private initialization: Promise<Strategy> | undefined;
	private writeQueue: Promise<void> = Promise.resolve();

	constructor({ probe, remote, local, notifier }: PreferenceCoordinatorDependencies) {
		this.probe = probe;
		this.remote = remote;
		this.local = local;
		this.notifier = notifier;
	}

	/**
	 * Probes the session and fixes the strategy. Later calls return the first call's promise.
	 */
	initialize(): Promise<Strategy> {
		if (!this.initialization) {
			this.initialization = this.resolveStrategy();
		}
		return this.initialization;
	}

	/**
	 * The strategy in effect. Reads as "local" until {@link initialize} resolves.
	 */
	getStrategy(): Strategy {
		return this.strategy;
	}

	/**
	 * The strategy a first render should assume. Before {@link initialize} resolves this reads the
	 * session markers the server rendered into the page; afterwards it is the resolved strategy.
	 */
	getExpectedStrategy(): Strategy {
		if (this.initialized) {
			return this.strategy;
		}
		return this.probe.detectFromPage() ? "server" : "local";
	}

	isInitialized(): boolean {
		return this.initialized;
	}

	/**
	 * Reads the full preference map from the most trusted source that answers.
	 */
	async getAll(): Promise<PreferenceMap> {
		const steps: Array<FallbackStep<StoredPreferences, ReadSource>> = [];
		if (this.strategy === "server") {
			steps.push({ name: "server", run: () => this.remote.read() });
		}
		steps.push({ name: "local", run: () => ok(this.local.read()) });

		const { value, source } = await resolveFallbackChain<StoredPreferences, ReadSource>(steps, {
			name: "defaults",
			run: () => ({}),
		});
		const preferences = sanitizePreferences(value);
		if (source === "server") {
			this.local.write(preferences);
		}
		return preferences;
	}

	/**
	 * Reads one preference. Unknown keys without a stored value resolve to undefined.
	 *
	 * @throws TypeError when the key is not a non-empty string
	 */
	get<K extends PreferenceKey>(key: K): Promise<KnownPreferences[K]>;
	get(key: string): Promise<PreferenceValue | undefined>;
	get(key: string): Promise<PreferenceValue | undefined> {
		assertPreferenceKey(key);
		return this.getAll().then(
			preferences => preferences[key] ?? (isKnownKey(key) ? DEFAULT_PREFERENCES[key] : undefined),
		);
	}

	/**
	 * Writes one preference. Invalid values of known preferences are replaced by their default.
	 *
	 * @throws TypeError when the key is not a non-empty string or the value is not a boolean or string
	 */
	set<K extends PreferenceKey>(key: K, value: KnownPreferences[K]): Promise<void>;
	set(key: string, value: PreferenceValue): Promise<void>;
	set(key: string, value: PreferenceValue): Promise<void> {
		assertPreferenceKey(key);
		assertPreferenceValue(key, value);
		return this.enqueueWrite({ [key]: value });
	}

	/**
	 * Writes several preferences at once, last write wins per key.
	 *
	 * @throws TypeError when any key or value is invalid; nothing is written then
	 */
	update(patch: Partial<KnownPreferences> & StoredPreferences): Promise<void> {
		for (const [key, value] of Object.entries(patch)) {
			assertPreferenceKey(key);
			assertPreferenceValue(key, value);
		}
		return this.enqueueWrite({ ...patch });
	}

	/**
	 * Registers a callback for preference changes made by other tabs.
	 *
	 * @returns Unsubscribe function
	 */
	onChange(callback: PreferenceChangeCallback): () => void {
		return this.notifier.onChange(callback);
	}

	destroy(): void {
		this.notifier.destroy();
	}

	private async resolveStrategy(): Promise<Strategy> {
		let authenticated = false;
		try {
			authenticated = await this.probe.detect();
		} catch (error) {
			log.warn(error, "Session probe rejected; using local preferences");
		}
		this.strategy = authenticated ? "server" : "local";
		this.initialized = true;
		log.info("Preference strategy resolved to %s", this.strategy);
		return this.strategy;
	}

	// Writes run one at a time so overlapping calls never read the same base map
	private enqueueWrite(patch: StoredPreferences): Promise<void> {
		const write = this.writeQueue.then(() => this.applyWrite(patch));
		// The caller sees a failure through `write`; the queue itself must keep going
		this.writeQueue = write.catch(() => undefined);
		return write;
	}

	private async applyWrite(patch: StoredPreferences): Promise<void> {
		const current = await this.getAll();
		const next = sanitizePreferences({ ...current, ...patch });
		this.local.write(next);
		if (this.strategy !== "server") {
			return;
		}

		const result = await this.remote.write(next);
		if (!result.success) {
			log.warn(
				{ kind: result.error.kind, status: result.error.status },
				"Remote preference write failed; keeping the local value: %s",
				result.error.message,
			);
			return;
		}
		this.local.write(sanitizePreferences({ ...next, ...result.value }));
	}
}
