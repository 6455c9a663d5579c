import { getLog } from "../../util/Logger";
import { CookieStorageBackend } from "./CookieStorageBackend";
import { localStorageBackend } from "./LocalStorageBackend";
import { parsePreferenceRecord, serializePreferenceRecord } from "./PreferenceRecord";
import { DEFAULT_PREFERENCES, PREFERENCES, valueOrDefault } from "./PreferencesRegistry";
import type { PreferenceDefinition, PreferenceValue, StorageBackend, StoredPreferences } from "./PreferencesTypes";

const log = getLog(import.meta);

/** Durable storage key of the serialized preference map */
export const DEFAULT_STORAGE_KEY = "mailhub_preferences";

/**
 * The device's copy of the preferences: a durable record plus mirrored cookies.
 */
export interface LocalStore {
	/**
	 * Returns the durable record as stored, or the cookie values merged onto the defaults when the
	 * record is missing or unreadable.
	 */
	read(): StoredPreferences;
	/**
	 * Writes the durable record and both cookies. Never throws.
	 */
	write(preferences: StoredPreferences): void;
}

export interface LocalPreferenceStoreOptions {
	storageKey?: string;
	/** Durable substrate, localStorage by default */
	durable?: StorageBackend;
	/** Cookie substrate, document cookies with a one-year lifetime by default */
	cookies?: StorageBackend;
}

export class LocalPreferenceStore implements LocalStore {
	readonly storageKey: string;
	private readonly durable: StorageBackend;
	private readonly cookies: StorageBackend;

	constructor(options: LocalPreferenceStoreOptions = {}) {
		this.storageKey = options.storageKey ?? DEFAULT_STORAGE_KEY;
		this.durable = options.durable ?? localStorageBackend;
		this.cookies = options.cookies ?? new CookieStorageBackend();
	}

	read(): StoredPreferences {
		const stored = this.readDurable();
		if (stored) {
			return stored;
		}
		return this.readCookies();
	}

	write(preferences: StoredPreferences): void {
		try {
			this.durable.setItem(this.storageKey, serializePreferenceRecord(preferences));
		} catch (error) {
			log.warn(error, "Failed to write preferences to durable storage");
		}
		// Cookies are written even when the durable write failed
		this.writeCookie(PREFERENCES.language, preferences.language);
		this.writeCookie(PREFERENCES.darkMode, preferences.darkMode);
	}

	private readDurable(): StoredPreferences | undefined {
		let raw: string | null;
		try {
			raw = this.durable.getItem(this.storageKey);
		} catch (error) {
			log.warn(error, "Failed to read preferences from durable storage");
			return;
		}
		if (!raw) {
			return;
		}
		const parsed = parsePreferenceRecord(raw);
		if (!parsed.success) {
			log.warn({ kind: parsed.error.kind }, "Ignoring stored preferences: %s", parsed.error.message);
			return;
		}
		return parsed.value;
	}

	private readCookies(): StoredPreferences {
		const preferences: StoredPreferences = { ...DEFAULT_PREFERENCES };
		const language = this.readCookie(PREFERENCES.language);
		if (language !== undefined) {
			preferences.language = language;
		}
		const darkMode = this.readCookie(PREFERENCES.darkMode);
		if (darkMode !== undefined) {
			preferences.darkMode = darkMode;
		}
		return preferences;
	}

	private readCookie<T extends PreferenceValue>(definition: PreferenceDefinition<T>): T | undefined {
		try {
			const raw = this.cookies.getItem(definition.cookieName);
			return raw ? definition.deserialize(raw) : undefined;
		} catch (error) {
			log.warn(error, "Failed to read cookie %s", definition.cookieName);
			return;
		}
	}

	private writeCookie<T extends PreferenceValue>(definition: PreferenceDefinition<T>, value: unknown): void {
		try {
			this.cookies.setItem(definition.cookieName, definition.serialize(valueOrDefault(definition, value)));
		} catch (error) {
			log.warn(error, "Failed to write cookie %s", definition.cookieName);
		}
	}
}
