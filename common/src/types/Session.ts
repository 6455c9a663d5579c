import { z } from "zod";

/**
 * Zod schema for the identity service's session verification body.
 * Fields beyond the known ones are kept as sent. A token without a username claim is verified
 * with `username: null`.
 */
export const SessionInfoSchema = z
	.object({
		authenticated: z.boolean().optional(),
		username: z.string().nullish(),
		roles: z.array(z.string()).optional(),
		is_admin: z.boolean().nullish(),
	})
	.passthrough();

export type SessionInfo = z.infer<typeof SessionInfoSchema>;
