export type { PreferenceSyncConfig } from "./config/PreferenceSyncConfig";
export { loadPreferenceSyncConfig } from "./config/PreferenceSyncConfig";
export type { PreferencesProviderProps } from "./contexts/PreferencesContext";
export { PreferencesProvider, usePreferences } from "./contexts/PreferencesContext";
export { usePreference, usePreferenceValue } from "./hooks/usePreference";
export * from "./services/preferences";
export { getLog } from "./util/Logger";
