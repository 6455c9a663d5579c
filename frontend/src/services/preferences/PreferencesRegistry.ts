/**
 * Registry of all known preferences with their definitions.
 *
 * This file centralizes all preference definitions, making it easy to:
 * - See all available preferences in one place
 * - Keep cookie, server and map names of a preference together
 * - Provide type safety for preference access
 */

import { fail, ok } from "mailhub-common";
import { type PreferenceResult, preferenceError } from "./PreferenceResult";
import {
	definePreference,
	isPreferenceValue,
	type KnownPreferences,
	type PreferenceDefinition,
	type PreferenceKey,
	type PreferenceMap,
	type PreferenceValue,
	Serializers,
	type StoredPreferences,
} from "./PreferencesTypes";

/**
 * Languages the identity service accepts.
 */
export const SUPPORTED_LANGUAGES: ReadonlyArray<string> = ["en", "cs"];

export function isSupportedLanguage(value: unknown): value is string {
	return typeof value === "string" && SUPPORTED_LANGUAGES.includes(value);
}

function isBoolean(value: unknown): value is boolean {
	return typeof value === "boolean";
}

/**
 * All preference definitions for the application.
 */
export const PREFERENCES = {
	/**
	 * Interface language.
	 */
	language: definePreference<string>({
		key: "language",
		cookieName: "language",
		wireName: "language",
		defaultValue: "en",
		...Serializers.string,
		validate: isSupportedLanguage,
	}),

	/**
	 * Whether the dark theme is active.
	 */
	darkMode: definePreference<boolean>({
		key: "darkMode",
		cookieName: "dark_mode",
		wireName: "dark_mode",
		defaultValue: false,
		...Serializers.boolean,
		validate: isBoolean,
	}),
} as const;

export const PREFERENCE_KEYS: ReadonlyArray<PreferenceKey> = ["language", "darkMode"];

export function isKnownKey(key: string): key is PreferenceKey {
	return PREFERENCE_KEYS.some(known => known === key);
}

export const DEFAULT_PREFERENCES: Readonly<KnownPreferences> = Object.freeze({
	language: PREFERENCES.language.defaultValue,
	darkMode: PREFERENCES.darkMode.defaultValue,
});

/**
 * Returns the value when the definition accepts it, otherwise the definition's default.
 */
export function valueOrDefault<T extends PreferenceValue>(definition: PreferenceDefinition<T>, value: unknown): T {
	return definition.validate(value) ? value : definition.defaultValue;
}

/**
 * Fills missing known keys from the defaults. Present values are kept when their type matches.
 */
export function withDefaults(map: StoredPreferences): PreferenceMap {
	const { language, darkMode } = map;
	return {
		...map,
		language: typeof language === "string" ? language : DEFAULT_PREFERENCES.language,
		darkMode: typeof darkMode === "boolean" ? darkMode : DEFAULT_PREFERENCES.darkMode,
	};
}

/**
 * Replaces invalid known values with their defaults and fills missing ones.
 * Unknown keys pass through unvalidated.
 */
export function sanitizePreferences(map: StoredPreferences): PreferenceMap {
	return {
		...map,
		language: valueOrDefault(PREFERENCES.language, map.language),
		darkMode: valueOrDefault(PREFERENCES.darkMode, map.darkMode),
	};
}

/**
 * Checks a key/value pair the way writes accept them, reporting problems instead of sanitizing.
 */
export function validatePreference(key: unknown, value: unknown): PreferenceResult<PreferenceValue> {
	if (typeof key !== "string" || key.length === 0) {
		return fail(preferenceError("InvalidKey", "Preference key must be a non-empty string"));
	}
	if (!isPreferenceValue(value)) {
		return fail(preferenceError("InvalidValue", `Preference ${key} must be a boolean or a string`));
	}
	if (isKnownKey(key) && !PREFERENCES[key].validate(value)) {
		return fail(preferenceError("InvalidValue", `Unsupported value for ${key}: ${String(value)}`));
	}
	return ok(value);
}
