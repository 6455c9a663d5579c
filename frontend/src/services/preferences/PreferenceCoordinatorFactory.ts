import { loadPreferenceSyncConfig, type PreferenceSyncConfig } from "../../config/PreferenceSyncConfig";
import { type ChangeBus, WindowStorageChangeBus } from "./ChangeBus";
import { CookieStorageBackend } from "./CookieStorageBackend";
import { type LocalStore, LocalPreferenceStore } from "./LocalPreferenceStore";
import { localStorageBackend } from "./LocalStorageBackend";
import { PreferenceChangeNotifier } from "./PreferenceChangeNotifier";
import { PreferenceCoordinator } from "./PreferenceCoordinator";
import type { StorageBackend } from "./PreferencesTypes";
import { RemotePreferenceStore, type RemoteStore } from "./RemotePreferenceStore";
import { type SessionDetector, SessionProbe } from "./SessionProbe";
import { type Client, type ClientCallbacks, createClient } from "mailhub-common";

export interface CreatePreferenceCoordinatorOptions {
	/** Overrides of the environment configuration */
	config?: Partial<PreferenceSyncConfig>;
	/** Identity service client; created from `identityBaseUrl` when omitted */
	client?: Client;
	/** Called when the identity service answers 401 */
	onUnauthorized?: ClientCallbacks["onUnauthorized"];
	probe?: SessionDetector;
	remote?: RemoteStore;
	local?: LocalStore;
	/** Durable substrate of the default LocalStore */
	durable?: StorageBackend;
	/** Cookie substrate of the default LocalStore */
	cookies?: StorageBackend;
	/** Cross-tab channel; browser storage events by default */
	bus?: ChangeBus;
}

/**
 * Wires a coordinator from the environment configuration. Every collaborator can be replaced,
 * which is how tests and non-browser targets use it.
 */
export function createPreferenceCoordinator(options: CreatePreferenceCoordinatorOptions = {}): PreferenceCoordinator {
	const config: PreferenceSyncConfig = { ...loadPreferenceSyncConfig(), ...options.config };
	const client =
		options.client ?? createClient(config.identityBaseUrl, undefined, { onUnauthorized: options.onUnauthorized });
	const local =
		options.local ??
		new LocalPreferenceStore({
			storageKey: config.storageKey,
			durable: options.durable ?? localStorageBackend,
			cookies: options.cookies ?? new CookieStorageBackend(config.cookieMaxAgeDays),
		});
	return new PreferenceCoordinator({
		probe: options.probe ?? new SessionProbe(client),
		remote: options.remote ?? new RemotePreferenceStore(client),
		local,
		notifier: new PreferenceChangeNotifier(options.bus ?? new WindowStorageChangeBus(), config.storageKey),
	});
}
