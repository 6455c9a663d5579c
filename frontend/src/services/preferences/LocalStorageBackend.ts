import type { StorageBackend } from "./PreferencesTypes";

/**
 * StorageBackend over the browser's localStorage.
 *
 * Errors from disabled storage or an exceeded quota propagate; `LocalPreferenceStore`
 * logs them and degrades to the cookies.
 */
export class LocalStorageBackend implements StorageBackend {
	getItem(key: string): string | null {
		return localStorage.getItem(key);
	}

	setItem(key: string, value: string): void {
		localStorage.setItem(key, value);
	}
}

export const localStorageBackend = new LocalStorageBackend();
