import { fail, isPlainObject, ok } from "mailhub-common";
import { type PreferenceResult, preferenceError } from "./PreferenceResult";
import { isPreferenceValue, type StoredPreferences } from "./PreferencesTypes";

/**
 * Keeps the primitive entries of an object and drops everything else.
 */
export function pickPreferenceValues(record: Record<string, unknown>): StoredPreferences {
	const preferences: StoredPreferences = {};
	for (const [key, value] of Object.entries(record)) {
		if (isPreferenceValue(value)) {
			preferences[key] = value;
		}
	}
	return preferences;
}

/**
 * Parses the durable record written by {@link serializePreferenceRecord}.
 */
export function parsePreferenceRecord(raw: string): PreferenceResult<StoredPreferences> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		return fail(preferenceError("MalformedLocalRecord", "Preference record is not valid JSON", { cause: error }));
	}
	if (!isPlainObject(parsed)) {
		return fail(preferenceError("MalformedLocalRecord", "Preference record is not an object"));
	}
	return ok(pickPreferenceValues(parsed));
}

export function serializePreferenceRecord(preferences: StoredPreferences): string {
	return JSON.stringify(preferences);
}
