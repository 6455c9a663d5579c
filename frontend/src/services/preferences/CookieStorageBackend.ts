import { readCookie, SECONDS_PER_DAY, setCookie } from "../../util/CookieUtil";
import type { StorageBackend } from "./PreferencesTypes";

/**
 * StorageBackend over document cookies. Every cookie is written with `path=/` and `SameSite=Lax`.
 * A rejected write throws.
 */
export class CookieStorageBackend implements StorageBackend {
	private readonly maxAgeSeconds: number;

	/**
	 * @param maxAgeDays lifetime of written cookies
	 */
	constructor(maxAgeDays = 365) {
		this.maxAgeSeconds = maxAgeDays * SECONDS_PER_DAY;
	}

	getItem(key: string): string | null {
		return readCookie(key) ?? null;
	}

	setItem(key: string, value: string): void {
		setCookie(key, value, { path: "/", sameSite: "Lax", maxAge: this.maxAgeSeconds, encodeValue: true });
	}
}
