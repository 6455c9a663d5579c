import { z } from "zod";

/**
 * Zod schema for a per-user preference record as the identity service stores it.
 * Field names are the server's (`dark_mode`), and a camelCase `darkMode` may also appear.
 */
export const WirePreferencesSchema = z.record(z.unknown());

export type WirePreferences = z.infer<typeof WirePreferencesSchema>;

/**
 * Body of a full-replace preference update. Only the fields present are sent.
 */
export interface UpdateWirePreferencesRequest {
	language?: string;
	dark_mode?: boolean;
}
