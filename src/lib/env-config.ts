/**
 * Configuration Management
 *
 * Loads configuration from the environment (and an optional .env file),
 * validates it and applies CLI overrides.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { Result, ok, err } from './result-types.js';
import { ConfigError } from './errors.js';
import {
	CHUNK_CONFIG,
	EMBEDDING_CONFIG,
	GENERATION_CONFIG,
	RETRIEVAL_CONFIG,
	SOURCE_CONFIG,
	STORAGE_CONFIG,
} from '../constants/pipeline-constants.js';
import type { PipelineConfig } from '../models/pipeline-config.js';

// ============================================================================
// Environment Schema
// ============================================================================

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
	.object({
		REGAUDIT_DATA_DIR: z.string().min(1).default(STORAGE_CONFIG.DEFAULT_DATA_DIR),
		REGAUDIT_WINDOW_SIZE: positiveInt(CHUNK_CONFIG.DEFAULT_WINDOW_SIZE),
		REGAUDIT_OVERLAP: z.coerce.number().int().nonnegative().default(CHUNK_CONFIG.DEFAULT_OVERLAP),
		REGAUDIT_TOP_K: positiveInt(RETRIEVAL_CONFIG.DEFAULT_TOP_K).pipe(
			z.number().max(RETRIEVAL_CONFIG.MAX_TOP_K)
		),
		REGAUDIT_EMBEDDER: z.enum(['gemini', 'hashing']).default('gemini'),
		REGAUDIT_EMBEDDING_MODEL: z.string().min(1).optional(),
		REGAUDIT_EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().optional(),
		REGAUDIT_EMBEDDING_TIMEOUT_MS: positiveInt(EMBEDDING_CONFIG.DEFAULT_TIMEOUT_MS),
		REGAUDIT_EMBED_BATCH_SIZE: positiveInt(EMBEDDING_CONFIG.DEFAULT_BATCH_SIZE).pipe(
			z.number().max(EMBEDDING_CONFIG.MAX_BATCH_SIZE)
		),
		REGAUDIT_GENERATION_MODEL: z.string().min(1).default(GENERATION_CONFIG.DEFAULT_MODEL),
		REGAUDIT_GENERATION_TIMEOUT_MS: positiveInt(GENERATION_CONFIG.DEFAULT_TIMEOUT_MS),
		REGAUDIT_ECFR_BASE_URL: z.string().url().default(SOURCE_CONFIG.DEFAULT_BASE_URL),
		REGAUDIT_ECFR_DATE: z
			.string()
			.regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
			.default(SOURCE_CONFIG.DEFAULT_DATE),
		REGAUDIT_ECFR_TITLE: positiveInt(SOURCE_CONFIG.DEFAULT_TITLE),
		REGAUDIT_ECFR_PART: positiveInt(SOURCE_CONFIG.DEFAULT_PART),
		REGAUDIT_FETCH_TIMEOUT_MS: positiveInt(SOURCE_CONFIG.DEFAULT_TIMEOUT_MS),
		GOOGLE_API_KEY: z.string().min(1).optional(),
	})
	.refine((env) => env.REGAUDIT_OVERLAP < env.REGAUDIT_WINDOW_SIZE, {
		message: 'REGAUDIT_OVERLAP must be smaller than REGAUDIT_WINDOW_SIZE',
		path: ['REGAUDIT_OVERLAP'],
	})
	// The hashing embedder has one fixed space
	.refine(
		(env) =>
			env.REGAUDIT_EMBEDDER !== 'hashing' ||
			env.REGAUDIT_EMBEDDING_MODEL === undefined ||
			env.REGAUDIT_EMBEDDING_MODEL === EMBEDDING_CONFIG.HASHING_MODEL_ID,
		{
			message: `the hashing embedder only supports ${EMBEDDING_CONFIG.HASHING_MODEL_ID}`,
			path: ['REGAUDIT_EMBEDDING_MODEL'],
		}
	)
	.refine(
		(env) =>
			env.REGAUDIT_EMBEDDER !== 'hashing' ||
			env.REGAUDIT_EMBEDDING_DIMENSIONS === undefined ||
			env.REGAUDIT_EMBEDDING_DIMENSIONS === EMBEDDING_CONFIG.HASHING_DIMENSIONS,
		{
			message: `the hashing embedder always produces ${EMBEDDING_CONFIG.HASHING_DIMENSIONS} dimensions`,
			path: ['REGAUDIT_EMBEDDING_DIMENSIONS'],
		}
	);

/**
 * Values the CLI may override
 */
export interface ConfigOverrides {
	dataDir?: string;
	windowSize?: number;
	overlap?: number;
	topK?: number;
	embedder?: 'gemini' | 'hashing';
	date?: string;
	title?: number;
	part?: number;
}

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Reads REGAUDIT_* variables (and GOOGLE_API_KEY) and resolves them into a
 * validated PipelineConfig.
 */
export class ConfigurationManager {
	constructor(
		private envPath?: string,
		private env: NodeJS.ProcessEnv = process.env
	) {}

	/**
	 * Load variables from the .env file into the environment
	 *
	 * A missing .env file is not an error.
	 */
	loadEnv(): Result<void, ConfigError> {
		const result = loadEnv({ path: this.envPath });
		if (result.error && !isMissingFile(result.error)) {
			return err(new ConfigError(`Failed to load .env file: ${result.error.message}`));
		}
		return ok(undefined);
	}

	/**
	 * Resolve the pipeline configuration
	 *
	 * @param overrides - CLI values that take precedence over the environment
	 */
	resolve(overrides: ConfigOverrides = {}): Result<PipelineConfig, ConfigError> {
		const merged: Record<string, string | number | undefined> = { ...this.env };
		setIfDefined(merged, 'REGAUDIT_DATA_DIR', overrides.dataDir);
		setIfDefined(merged, 'REGAUDIT_WINDOW_SIZE', overrides.windowSize);
		setIfDefined(merged, 'REGAUDIT_OVERLAP', overrides.overlap);
		setIfDefined(merged, 'REGAUDIT_TOP_K', overrides.topK);
		setIfDefined(merged, 'REGAUDIT_EMBEDDER', overrides.embedder);
		setIfDefined(merged, 'REGAUDIT_ECFR_DATE', overrides.date);
		setIfDefined(merged, 'REGAUDIT_ECFR_TITLE', overrides.title);
		setIfDefined(merged, 'REGAUDIT_ECFR_PART', overrides.part);

		// Blank values in .env files mean "unset"
		for (const [key, value] of Object.entries(merged)) {
			if (value === '') {
				merged[key] = undefined;
			}
		}

		const parsed = EnvSchema.safeParse(merged);
		if (!parsed.success) {
			const details = parsed.error.issues
				.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
				.join('; ');
			return err(new ConfigError(`Invalid configuration: ${details}`));
		}

		const env = parsed.data;
		const hashing = env.REGAUDIT_EMBEDDER === 'hashing';
		const embeddingModel =
			env.REGAUDIT_EMBEDDING_MODEL ??
			(hashing ? EMBEDDING_CONFIG.HASHING_MODEL_ID : EMBEDDING_CONFIG.DEFAULT_GEMINI_MODEL);
		const embeddingDimensions =
			env.REGAUDIT_EMBEDDING_DIMENSIONS ??
			(hashing ? EMBEDDING_CONFIG.HASHING_DIMENSIONS : EMBEDDING_CONFIG.GEMINI_DIMENSIONS);

		return ok({
			dataDir: env.REGAUDIT_DATA_DIR,
			chunking: {
				windowSize: env.REGAUDIT_WINDOW_SIZE,
				overlap: env.REGAUDIT_OVERLAP,
			},
			topK: env.REGAUDIT_TOP_K,
			embedding: {
				kind: env.REGAUDIT_EMBEDDER,
				model: embeddingModel,
				dimensions: embeddingDimensions,
				batchSize: env.REGAUDIT_EMBED_BATCH_SIZE,
				timeoutMs: env.REGAUDIT_EMBEDDING_TIMEOUT_MS,
			},
			generation: {
				model: env.REGAUDIT_GENERATION_MODEL,
				timeoutMs: env.REGAUDIT_GENERATION_TIMEOUT_MS,
			},
			source: {
				baseUrl: env.REGAUDIT_ECFR_BASE_URL,
				date: env.REGAUDIT_ECFR_DATE,
				title: env.REGAUDIT_ECFR_TITLE,
				part: env.REGAUDIT_ECFR_PART,
				timeoutMs: env.REGAUDIT_FETCH_TIMEOUT_MS,
			},
			googleApiKey: env.GOOGLE_API_KEY,
		});
	}

	/**
	 * Load .env and resolve in one step
	 */
	load(overrides: ConfigOverrides = {}): Result<PipelineConfig, ConfigError> {
		return this.loadEnv().andThen(() => this.resolve(overrides));
	}
}

/**
 * Require the Google API key for commands that call hosted models
 */
export function requireApiKey(config: PipelineConfig): Result<string, ConfigError> {
	if (!config.googleApiKey) {
		return err(
			new ConfigError(
				'GOOGLE_API_KEY is not set. Add it to your environment or .env file.'
			)
		);
	}
	return ok(config.googleApiKey);
}

function setIfDefined(
	target: Record<string, string | number | undefined>,
	key: string,
	value: string | number | undefined
): void {
	if (value !== undefined) {
		target[key] = value;
	}
}

function isMissingFile(error: Error): boolean {
	return 'code' in error && error.code === 'ENOENT';
}
