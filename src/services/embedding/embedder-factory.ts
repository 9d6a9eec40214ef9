/**
 * Embedder Factory
 *
 * Selects the embedding strategy named by the configuration.
 */

import { Result, ok } from '../../lib/result-types.js';
import type { ConfigError, ErrorStage } from '../../lib/errors.js';
import { requireApiKey } from '../../lib/env-config.js';
import type { PipelineConfig } from '../../models/pipeline-config.js';
import type { PipelineLogger } from '../../cli/utils/logger.js';
import type { Embedder } from './adapter-interface.js';
import { GeminiEmbedder } from './GeminiEmbedder.js';
import { HashingEmbedder } from './HashingEmbedder.js';

export function createEmbedder(
	config: PipelineConfig,
	stage: ErrorStage,
	logger?: PipelineLogger
): Result<Embedder, ConfigError> {
	if (config.embedding.kind === 'hashing') {
		return ok(new HashingEmbedder());
	}

	return requireApiKey(config).map(
		(apiKey) =>
			new GeminiEmbedder({
				apiKey,
				model: config.embedding.model,
				dimensions: config.embedding.dimensions,
				batchSize: config.embedding.batchSize,
				timeoutMs: config.embedding.timeoutMs,
				stage,
				logger,
			})
	);
}
