import type { UpdateWirePreferencesRequest, WirePreferences } from "../types/Preferences";
import { WirePreferencesSchema } from "../types/Preferences";
import type { ClientAuth } from "./Client";
import { ClientError, type ClientMethod, createHttpError, readJson } from "./ClientError";

/**
 * Client interface for the per-user preference resource of the identity service.
 */
export interface UserPreferencesClient {
	/**
	 * Get the stored preference record of a user.
	 */
	get(username: string): Promise<WirePreferences>;

	/**
	 * Replace the stored preference record of a user and return the server's copy.
	 */
	update(username: string, data: UpdateWirePreferencesRequest): Promise<WirePreferences>;
}

export function createUserPreferencesClient(baseUrl: string, auth: ClientAuth): UserPreferencesClient {
	return {
		get,
		update,
	};

	function preferencesUrl(username: string): string {
		return `${baseUrl}/api/identity/users/${encodeURIComponent(username)}/preferences`;
	}

	function get(username: string): Promise<WirePreferences> {
		return send("GET", preferencesUrl(username), undefined, "Failed to get preferences");
	}

	function update(username: string, data: UpdateWirePreferencesRequest): Promise<WirePreferences> {
		return send("PUT", preferencesUrl(username), data, "Failed to update preferences");
	}

	async function send(
		method: ClientMethod,
		url: string,
		body: UpdateWirePreferencesRequest | undefined,
		failureMessage: string,
	): Promise<WirePreferences> {
		const response = await fetch(url, auth.createRequest(method, body));
		auth.checkUnauthorized?.(response);
		if (!response.ok) {
			throw await createHttpError(method, url, response, failureMessage);
		}
		const json = await readJson(method, url, response);
		const parsed = WirePreferencesSchema.safeParse(json);
		if (!parsed.success) {
			throw new ClientError(method, url, response.status, "malformed_response", "Preference record is not an object");
		}
		return parsed.data;
	}
}
