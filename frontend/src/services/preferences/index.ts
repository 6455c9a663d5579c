/**
 * Preference synchronization public API.
 *
 * @example
 * ```typescript
 * import { createPreferenceCoordinator } from "../services/preferences";
 *
 * const coordinator = createPreferenceCoordinator();
 * await coordinator.initialize();
 *
 * const language = await coordinator.get("language");
 * await coordinator.set("darkMode", true);
 * const unsubscribe = coordinator.onChange(preferences => applyTheme(preferences.darkMode));
 * ```
 */

// Change propagation
export type { ChangeBus, StorageChange, StorageChangeHandler } from "./ChangeBus";
export { InProcessChangeBus, WindowStorageChangeBus } from "./ChangeBus";
export type { PreferenceChangeCallback } from "./PreferenceChangeNotifier";
export { PreferenceChangeNotifier } from "./PreferenceChangeNotifier";
// Storage backends
export { CookieStorageBackend } from "./CookieStorageBackend";
export { LocalStorageBackend, localStorageBackend } from "./LocalStorageBackend";
// Stores
export type { LocalPreferenceStoreOptions, LocalStore } from "./LocalPreferenceStore";
export { DEFAULT_STORAGE_KEY, LocalPreferenceStore } from "./LocalPreferenceStore";
export type { RemoteStore } from "./RemotePreferenceStore";
export { RemotePreferenceStore } from "./RemotePreferenceStore";
export type { SessionDetector } from "./SessionProbe";
export { SessionProbe } from "./SessionProbe";
// Coordinator
export type { ChangeSubscriber, PreferenceCoordinatorDependencies } from "./PreferenceCoordinator";
export { PreferenceCoordinator } from "./PreferenceCoordinator";
export type { CreatePreferenceCoordinatorOptions } from "./PreferenceCoordinatorFactory";
export { createPreferenceCoordinator } from "./PreferenceCoordinatorFactory";
// Results and fallback
export type { FallbackResolution, FallbackStep, FinalStep } from "./FallbackChain";
export { resolveFallbackChain } from "./FallbackChain";
export type { PreferenceError, PreferenceErrorKind, PreferenceResult } from "./PreferenceResult";
export { classifyRemoteError, preferenceError } from "./PreferenceResult";
// Preference definitions
export {
	DEFAULT_PREFERENCES,
	isSupportedLanguage,
	PREFERENCES,
	PREFERENCE_KEYS,
	SUPPORTED_LANGUAGES,
	sanitizePreferences,
	validatePreference,
	withDefaults,
} from "./PreferencesRegistry";
// Core types
export type {
	KnownPreferences,
	PreferenceDefinition,
	PreferenceKey,
	PreferenceMap,
	PreferenceValue,
	StorageBackend,
	StoredPreferences,
	Strategy,
} from "./PreferencesTypes";
