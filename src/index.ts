/**
 * regaudit library entry point
 */

export * from './lib/errors.js';
export { ConfigurationManager, requireApiKey, type ConfigOverrides } from './lib/env-config.js';
export { generateChunkId } from './lib/chunk-utils.js';

export type { RegulationDocument, RegulationSection, SourceLocator } from './models/regulation-document.js';
export type { RegulationChunk, ScoredChunk } from './models/regulation-chunk.js';
export type { EmbeddingSpace, EmbeddingVector, VectorIndexEntry } from './models/embedding-vector.js';
export type { IngestionReport } from './models/ingestion-report.js';
export type { PipelineConfig } from './models/pipeline-config.js';
export * from './models/audit-request.js';

export { EcfrClient, type EcfrClientOptions } from './services/ecfr-client.js';
export { EcfrXmlParser } from './services/parser/EcfrXmlParser.js';
export { TextChunker, createSectionResolver, type TextChunkerOptions } from './services/chunker/TextChunker.js';
export type { Embedder } from './services/embedding/adapter-interface.js';
export { GeminiEmbedder } from './services/embedding/GeminiEmbedder.js';
export { HashingEmbedder } from './services/embedding/HashingEmbedder.js';
export { VectorIndex, type IndexStats } from './services/vector-storage.js';
export { CorpusIngestor, type CorpusSource } from './services/ingestion/CorpusIngestor.js';
export { Retriever } from './services/retrieval/Retriever.js';
export { buildAuditPrompt } from './services/generation/prompts.js';
export { GeminiLanguageModel, type LanguageModel } from './services/generation/language-model.js';
export { AuditGenerator } from './services/generation/AuditGenerator.js';
export { AuditPipeline, type TracedAudit } from './services/pipeline/AuditPipeline.js';
export { buildAudit, buildIngestion, buildSearch } from './services/pipeline/pipeline-factory.js';
export { SectionExtractor, cleanText, type ProtocolSection } from './services/protocol/SectionExtractor.js';
export { Redactor, type RedactionResult } from './services/protocol/Redactor.js';
