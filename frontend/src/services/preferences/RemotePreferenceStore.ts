import { getLog } from "../../util/Logger";
import { type PreferenceResult, classifyRemoteError, preferenceError } from "./PreferenceResult";
import { PREFERENCES } from "./PreferencesRegistry";
import type { StoredPreferences } from "./PreferencesTypes";
import { type Client, fail, ok, type UpdateWirePreferencesRequest, type WirePreferences } from "mailhub-common";

const log = getLog(import.meta);

/**
 * The identity service's copy of a user's preferences.
 */
export interface RemoteStore {
	read(): Promise<PreferenceResult<StoredPreferences>>;
	/**
	 * Replaces the server record and resolves with the server's echoed copy.
	 */
	write(preferences: StoredPreferences): Promise<PreferenceResult<StoredPreferences>>;
}

const CAMEL_CASE_DARK_MODE = "darkMode";

/**
 * Maps a server record to map keys. `dark_mode` wins over a camelCase `darkMode`; other primitive
 * fields pass through under their own names.
 */
export function fromWire(record: WirePreferences): StoredPreferences {
	const preferences: StoredPreferences = {};
	for (const [field, value] of Object.entries(record)) {
		if (field === PREFERENCES.darkMode.wireName || field === CAMEL_CASE_DARK_MODE) {
			continue;
		}
		if (typeof value === "string" || typeof value === "boolean") {
			preferences[field] = value;
		}
	}
	const snakeDarkMode = record[PREFERENCES.darkMode.wireName];
	const camelDarkMode = record[CAMEL_CASE_DARK_MODE];
	if (typeof snakeDarkMode === "boolean") {
		preferences.darkMode = snakeDarkMode;
	} else if (typeof camelDarkMode === "boolean") {
		preferences.darkMode = camelDarkMode;
	}
	return preferences;
}

/**
 * Maps known keys to server fields. Keys missing from the map are left out of the body.
 */
export function toWire(preferences: StoredPreferences): UpdateWirePreferencesRequest {
	const body: UpdateWirePreferencesRequest = {};
	const { language, darkMode } = preferences;
	if (typeof language === "string") {
		body.language = language;
	}
	if (typeof darkMode === "boolean") {
		body.dark_mode = darkMode;
	}
	return body;
}

/**
 * RemoteStore backed by the identity service. The session is verified on every call so that an
 * expired session never reads or writes under a stale username.
 */
export class RemotePreferenceStore implements RemoteStore {
	constructor(private readonly client: Client) {}

	async read(): Promise<PreferenceResult<StoredPreferences>> {
		const username = await this.resolveUsername();
		if (!username.success) {
			return username;
		}
		try {
			const record = await this.client.preferences().get(username.value);
			log.debug("Read preferences of %s", username.value);
			return ok(fromWire(record));
		} catch (error) {
			return fail(classifyRemoteError(error));
		}
	}

	async write(preferences: StoredPreferences): Promise<PreferenceResult<StoredPreferences>> {
		const username = await this.resolveUsername();
		if (!username.success) {
			return username;
		}
		try {
			const echo = await this.client.preferences().update(username.value, toWire(preferences));
			log.debug("Wrote preferences of %s", username.value);
			return ok(fromWire(echo));
		} catch (error) {
			return fail(classifyRemoteError(error));
		}
	}

	private async resolveUsername(): Promise<PreferenceResult<string>> {
		try {
			const session = await this.client.session().verify();
			if (session?.username) {
				return ok(session.username);
			}
			return fail(preferenceError("NotAuthenticated", "No active session"));
		} catch (error) {
			return fail(preferenceError("NotAuthenticated", "Session verification failed", { cause: error }));
		}
	}
}
