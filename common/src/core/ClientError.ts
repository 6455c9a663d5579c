import { isPlainObject } from "../util/ObjectUtils";

export type ClientMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * Why a client call failed after the transport itself succeeded.
 * - http_error: the server answered with a non-2xx status
 * - invalid_json_response: the body could not be decoded as JSON
 * - malformed_response: the body was JSON but not the expected shape
 */
export type ClientErrorCode = "http_error" | "invalid_json_response" | "malformed_response";

export class ClientError extends Error {
	readonly name = "ClientError";

	constructor(
		readonly method: ClientMethod,
		readonly url: string,
		readonly status: number,
		readonly code: ClientErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

export function isClientError(error: unknown): error is ClientError {
	return error instanceof ClientError;
}

/**
 * Decodes a JSON response body, wrapping decode failures in a {@link ClientError}.
 */
export async function readJson(method: ClientMethod, url: string, response: Response): Promise<unknown> {
	try {
		return await response.json();
	} catch (error) {
		throw new ClientError(method, url, response.status, "invalid_json_response", "Response was not valid JSON", {
			cause: error,
		});
	}
}

/**
 * Builds the error for a non-2xx response, preferring the message the server sent.
 */
export async function createHttpError(
	method: ClientMethod,
	url: string,
	response: Response,
	fallbackMessage: string,
): Promise<ClientError> {
	// Error bodies are optional
	const body: unknown = await response.json().catch(() => undefined);
	const message = extractErrorMessage(body) ?? fallbackMessage;
	return new ClientError(method, url, response.status, "http_error", message);
}

function extractErrorMessage(body: unknown): string | undefined {
	if (!isPlainObject(body)) {
		return;
	}
	for (const field of ["detail", "message", "error"]) {
		const value = body[field];
		if (typeof value === "string" && value.length > 0) {
			return value;
		}
	}
	return;
}
