import { z } from "zod";

// Vite leaves `VITE_X=` as an empty string; treat it like an unset variable
const unsetWhenEmpty = (value: unknown) => (value === "" ? undefined : value);

/**
 * Zod schema for the Vite environment variables of preference synchronization.
 */
export const PreferenceSyncEnvSchema = z.object({
	VITE_IDENTITY_BASE_URL: z.preprocess(
		unsetWhenEmpty,
		z
			.string()
			.regex(/^(?:$|https?:\/\/|\/)/, "must be an http(s) URL or an absolute path")
			.transform(url => url.replace(/\/+$/, ""))
			.default(""),
	),
	VITE_PREFERENCES_STORAGE_KEY: z.preprocess(unsetWhenEmpty, z.string().default("mailhub_preferences")),
	VITE_PREFERENCES_COOKIE_DAYS: z.preprocess(
		unsetWhenEmpty,
		z.coerce.number().int().positive().max(3650).default(365),
	),
});

export interface PreferenceSyncConfig {
	/** Origin (or path prefix) of the identity service, empty for same origin */
	identityBaseUrl: string;
	/** Durable storage key of the preference record */
	storageKey: string;
	/** Lifetime of the mirrored cookies */
	cookieMaxAgeDays: number;
}

/**
 * Reads the preference sync configuration, by default from `import.meta.env`.
 *
 * @throws Error describing every invalid variable
 */
export function loadPreferenceSyncConfig(env: Record<string, unknown> = import.meta.env): PreferenceSyncConfig {
	const parsed = PreferenceSyncEnvSchema.safeParse(env);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
		throw new Error(`Invalid preference sync configuration: ${issues}`);
	}
	return {
		identityBaseUrl: parsed.data.VITE_IDENTITY_BASE_URL,
		storageKey: parsed.data.VITE_PREFERENCES_STORAGE_KEY,
		cookieMaxAgeDays: parsed.data.VITE_PREFERENCES_COOKIE_DAYS,
	};
}
