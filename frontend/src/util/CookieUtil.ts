/**
 * Cookie helpers for browser-side persistence.
 */

import { getLog } from "./Logger";

const log = getLog(import.meta);

export interface CookieOptions {
	path?: string;
	maxAge?: number;
	sameSite?: "Lax" | "Strict" | "None";
	domain?: string;
	secure?: boolean;
	encodeValue?: boolean;
}

/** Seconds in one day, for `max-age` */
export const SECONDS_PER_DAY = 24 * 60 * 60;

/**
 * Reads a cookie of the current document. Values written with `encodeValue` are decoded.
 * Returns undefined when the cookie is absent or the cookie jar cannot be read.
 */
export function readCookie(name: string): string | undefined {
	let cookieHeader: string;
	try {
		cookieHeader = document.cookie;
	} catch (error) {
		log.warn(error, "Unable to read cookie %s", name);
		return;
	}
	for (const cookie of cookieHeader.split(";")) {
		const trimmed = cookie.trim();
		const separator = trimmed.indexOf("=");
		if (separator < 0 || trimmed.substring(0, separator) !== name) {
			continue;
		}
		const rawValue = trimmed.substring(separator + 1);
		try {
			return decodeURIComponent(rawValue);
		} catch {
			return rawValue;
		}
	}
	return;
}

/**
 * Writes a cookie of the current document. Errors from the cookie jar propagate to the caller.
 */
export function setCookie(name: string, value: string, options: CookieOptions = {}): void {
	const { path = "/", maxAge, sameSite = "Lax", domain, secure = false, encodeValue = false } = options;

	const serializedValue = encodeValue ? encodeURIComponent(value) : value;
	const maxAgePart = typeof maxAge === "number" ? `; max-age=${maxAge}` : "";
	const domainPart = domain ? `; domain=${domain}` : "";
	const securePart = secure ? "; Secure" : "";
	// biome-ignore lint/suspicious/noDocumentCookie: Cookie API is required for browser-side persistence
	document.cookie = `${name}=${serializedValue}; path=${path}; SameSite=${sameSite}${maxAgePart}${domainPart}${securePart}`;
}
