/**
 * Failures of the preference stores, reported as values.
 *
 * Nothing in this taxonomy reaches callers of the coordinator: each failure moves the read to the
 * next source of lower trust, or is logged after an optimistic local write.
 */

import { isClientError, type Result } from "mailhub-common";

export type PreferenceErrorKind =
	/** No session, or the identity service refused the session */
	| "NotAuthenticated"
	/** Network failure (status 0) or a non-2xx response */
	| "RemoteUnavailable"
	/** A 2xx response whose body is not a preference record */
	| "MalformedRemoteRecord"
	/** The durable record could not be read or parsed */
	| "MalformedLocalRecord"
	/** A key that is not a non-empty string */
	| "InvalidKey"
	/** A value of the wrong type, or one the preference does not accept */
	| "InvalidValue";

export interface PreferenceError {
	kind: PreferenceErrorKind;
	message: string;
	status?: number;
	cause?: unknown;
}

export type PreferenceResult<T> = Result<T, PreferenceError>;

export function preferenceError(
	kind: PreferenceErrorKind,
	message: string,
	details: { status?: number; cause?: unknown } = {},
): PreferenceError {
	return { kind, message, ...details };
}

/**
 * Maps an error thrown by the identity clients (or by fetch itself) to a {@link PreferenceError}.
 */
export function classifyRemoteError(error: unknown): PreferenceError {
	if (isClientError(error)) {
		if (error.status === 401 || error.status === 403) {
			return preferenceError("NotAuthenticated", error.message, { status: error.status, cause: error });
		}
		if (error.code === "http_error") {
			return preferenceError("RemoteUnavailable", error.message, { status: error.status, cause: error });
		}
		return preferenceError("MalformedRemoteRecord", error.message, { status: error.status, cause: error });
	}
	const message = error instanceof Error ? error.message : String(error);
	return preferenceError("RemoteUnavailable", message, { status: 0, cause: error });
}
