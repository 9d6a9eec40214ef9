/**
 * Ingestion Report Model
 */

import { z } from 'zod';

export const IngestionReportSchema = z.object({
	corpusId: z.string(),
	/** Where the regulation text came from (URL or file path) */
	source: z.string(),
	sections: z.number().int().nonnegative(),
	chunks: z.number().int().nonnegative(),
	inserted: z.number().int().nonnegative(),
	skipped: z.number().int().nonnegative(),
	removed: z.number().int().nonnegative(),
	modelId: z.string(),
	durationMs: z.number().nonnegative(),
	completedAt: z.string(),
});

/**
 * Summary of one corpus ingestion run
 */
export type IngestionReport = z.infer<typeof IngestionReportSchema>;
