/**
 * Response Schemas
 *
 * Zod schemas for the two open-data responses the dashboard consumes.
 * Only the fields the dashboard reads are validated; everything else in the
 * payload is ignored.
 */

import { z } from "zod";

/**
 * Historical window response: `{ pagination: { total }, data: [...] }`.
 *
 * Elements of `data` are left unvalidated here, since the max scan tolerates
 * individual bad entries instead of rejecting the whole page.
 */
export const HistoricalResponseSchema = z.object({
	pagination: z.object({
		total: z.number(),
	}),
	data: z.array(z.unknown()),
});

export type HistoricalResponse = z.infer<typeof HistoricalResponseSchema>;

/**
 * A single observation inside `data`
 */
export const ObservationSchema = z.object({
	value: z.number().finite(),
});

/**
 * Latest reading response: `{ endTime, value, ... }`.
 *
 * `endTime` stays a string so it reaches the dashboard exactly as sent.
 */
export const LatestReadingSchema = z.object({
	endTime: z.string().refine((value) => !Number.isNaN(Date.parse(value)), "endTime is not a valid timestamp"),
	value: z.number().finite(),
});

export type LatestReadingResponse = z.infer<typeof LatestReadingSchema>;

/**
 * Flatten zod issues into "path: message" strings for error reporting
 */
export function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}
