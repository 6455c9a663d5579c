import { memoized } from "../util/ObjectUtils";
import type { ClientMethod } from "./ClientError";
import { createSessionClient, type SessionClient } from "./SessionClient";
import { createUserPreferencesClient, type UserPreferencesClient } from "./UserPreferencesClient";

export interface Client {
	session(): SessionClient;
	preferences(): UserPreferencesClient;
}

export interface ClientAuth {
	authToken?: string | undefined;
	createRequest(method: ClientMethod, body?: unknown, additional?: Partial<RequestInit>): RequestInit;
	/**
	 * Checks if response is a 401 and triggers the onUnauthorized callback if so.
	 * Returns true if unauthorized (so caller can handle early return).
	 * Optional - if not provided, 401 responses are not specially handled.
	 */
	checkUnauthorized?(response: Response): boolean;
}

/**
 * Callbacks that can be triggered by client operations
 */
export interface ClientCallbacks {
	/**
	 * Called when a 401 Unauthorized response is received.
	 * Useful for triggering session expiration handling.
	 */
	onUnauthorized?: () => void;
}

/**
 * Create an identity service client. Requests carry the browser's cookies; a bearer token is
 * added for targets without a cookie jar.
 *
 * @param baseUrl origin of the identity service, empty for same origin.
 */
export function createClient(baseUrl = "", authToken?: string, callbacks?: ClientCallbacks): Client {
	const auth: ClientAuth = {
		authToken,
		createRequest,
		checkUnauthorized,
	};
	return {
		session: memoized(() => createSessionClient(baseUrl, auth)),
		preferences: memoized(() => createUserPreferencesClient(baseUrl, auth)),
	};

	function checkUnauthorized(response: Response): boolean {
		if (response.status === 401 && callbacks?.onUnauthorized) {
			callbacks.onUnauthorized();
			return true;
		}
		return false;
	}

	function createRequest(method: ClientMethod, body?: unknown, additional?: Partial<RequestInit>): RequestInit {
		const headers: Record<string, string> = { Accept: "application/json" };
		if (auth.authToken) {
			headers.Authorization = `Bearer ${auth.authToken}`;
		}
		if (body) {
			headers["Content-Type"] = "application/json";
		}

		return {
			method,
			headers,
			body: body ? JSON.stringify(body) : null,
			credentials: "include",
			...additional,
		};
	}
}
