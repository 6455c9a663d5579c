/**
 * Types and interfaces for preference synchronization.
 *
 * Preferences live in two places: the identity service (authoritative for signed-in users) and the
 * device (durable storage plus mirrored cookies). The coordinator decides per page load which one
 * is authoritative and reconciles the two.
 */

/**
 * Storage backend interface - allows for different implementations
 * (localStorage, cookies, an in-memory map in tests, etc.). Backends may throw; the local store
 * handles their errors.
 */
export interface StorageBackend {
	getItem(key: string): string | null;
	setItem(key: string, value: string): void;
}

/**
 * A single preference value. Only primitives are persisted.
 */
export type PreferenceValue = boolean | string;

/**
 * Preferences every map carries, with their value types.
 */
export interface KnownPreferences {
	language: string;
	darkMode: boolean;
}

export type PreferenceKey = keyof KnownPreferences;

/**
 * A map as a store holds it. Keys may be missing; unknown keys are kept as they are.
 */
export type StoredPreferences = Record<string, PreferenceValue>;

/**
 * A map as readers receive it: every known key is present.
 */
export type PreferenceMap = KnownPreferences & StoredPreferences;

/**
 * Which side is authoritative for this page load.
 * - "server": the identity service, with the device as a write-through cache
 * - "local": the device only
 */
export type Strategy = "server" | "local";

/**
 * Serializer functions for converting between stored strings and typed values.
 */
export interface PreferenceSerializer<T> {
	serialize: (value: T) => string;
	deserialize: (value: string) => T;
}

/**
 * Common serializers for standard data types.
 */
export const Serializers = {
	string: {
		serialize: (value: string): string => value,
		deserialize: (value: string): string => value,
	},
	boolean: {
		serialize: (value: boolean): string => String(value),
		deserialize: (value: string): boolean => value === "true",
	},
} as const;

/**
 * Definition of a preference with metadata for storage and type safety.
 *
 * @template T - The type of the preference value
 */
export interface PreferenceDefinition<T extends PreferenceValue> extends PreferenceSerializer<T> {
	/** Key in the preference map and the durable record */
	key: PreferenceKey;
	/** Name of the mirrored cookie */
	cookieName: string;
	/** Field name used by the identity service */
	wireName: string;
	/** Value used when the preference is missing or invalid */
	defaultValue: T;
	/** Whether an arbitrary value is acceptable for this preference */
	validate: (value: unknown) => value is T;
}

/**
 * Helper to create a preference definition with type inference.
 */
export function definePreference<T extends PreferenceValue>(definition: PreferenceDefinition<T>): PreferenceDefinition<T> {
	return definition;
}

export function isPreferenceValue(value: unknown): value is PreferenceValue {
	return typeof value === "boolean" || typeof value === "string";
}
