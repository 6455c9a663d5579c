/**
 * Preact hooks for working with single preferences.
 */

import { usePreferences } from "../contexts/PreferencesContext";
import type { KnownPreferences, PreferenceKey } from "../services/preferences";
import { useCallback } from "preact/hooks";

/**
 * Hook to read and write a single preference with automatic re-renders.
 *
 * @returns A tuple of [value, setValue] similar to useState; the setter resolves once the
 * value is persisted
 *
 * @example
 * ```tsx
 * function DarkModeToggle() {
 *   const [darkMode, setDarkMode] = usePreference("darkMode");
 *   return <button onClick={() => setDarkMode(!darkMode)}>{darkMode ? "Light" : "Dark"}</button>;
 * }
 * ```
 */
export function usePreference<K extends PreferenceKey>(
	key: K,
): [KnownPreferences[K], (value: KnownPreferences[K]) => Promise<void>] {
	const { preferences, setPreference } = usePreferences();

	const setValue = useCallback((value: KnownPreferences[K]) => setPreference(key, value), [setPreference, key]);

	return [preferences[key], setValue];
}

/**
 * Hook to read a preference value only (no setter).
 */
export function usePreferenceValue<K extends PreferenceKey>(key: K): KnownPreferences[K] {
	return usePreferences().preferences[key];
}
