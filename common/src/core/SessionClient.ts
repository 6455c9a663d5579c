import { isNonEmptyObject, isPlainObject } from "../util/ObjectUtils";
import { type SessionInfo, SessionInfoSchema } from "../types/Session";
import type { ClientAuth } from "./Client";
import { ClientError, readJson } from "./ClientError";

/**
 * Client interface for session verification against the identity service.
 */
export interface SessionClient {
	/**
	 * Verify the cookie session of the current browser.
	 * Resolves to undefined when there is no session (non-2xx or an empty body).
	 */
	verify(): Promise<SessionInfo | undefined>;
}

export function createSessionClient(baseUrl: string, auth: ClientAuth): SessionClient {
	return { verify };

	async function verify(): Promise<SessionInfo | undefined> {
		const url = `${baseUrl}/api/identity/session/verify`;
		const response = await fetch(url, auth.createRequest("GET"));
		auth.checkUnauthorized?.(response);
		if (!response.ok) {
			return;
		}
		const body = await readJson("GET", url, response);
		if (!isPlainObject(body)) {
			throw new ClientError("GET", url, response.status, "malformed_response", "Session body is not an object");
		}
		if (!isNonEmptyObject(body)) {
			return;
		}
		const parsed = SessionInfoSchema.safeParse(body);
		if (!parsed.success) {
			throw new ClientError("GET", url, response.status, "malformed_response", parsed.error.message);
		}
		return parsed.data;
	}
}
