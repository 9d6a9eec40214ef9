/**
 * Vector Storage Service
 *
 * Local vector index over better-sqlite3 with the sqlite-vec extension.
 * Every entry pairs a regulation chunk with its embedding; similarity is
 * computed with vec_distance_cosine. The index is bound to one embedding
 * space (model + dimensions), recorded in its meta table on first use.
 */

import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { mkdirSync } from 'fs';
import path from 'path';
import { Result, ok, err, trySync, asError, describeError } from '../lib/result-types.js';
import { IndexUnavailableError } from '../lib/errors.js';
import type { ErrorStage } from '../lib/errors.js';
import { encodeEmbedding, vectorNorm } from '../lib/embedding-utils.js';
import type { EmbeddingSpace, EmbeddingVector, VectorIndexEntry } from '../models/embedding-vector.js';
import type { RegulationChunk, ScoredChunk } from '../models/regulation-chunk.js';
import { IngestionReportSchema, type IngestionReport } from '../models/ingestion-report.js';
import * as createRegulationIndex from './database/migrations/001_create_regulation_index.js';

/**
 * Corpus id used by add() when none is given
 */
export const DEFAULT_CORPUS_ID = 'default';

const MIGRATIONS = [createRegulationIndex];

const META_SCHEMA_VERSION = 'schema_version';
const META_MODEL_ID = 'model_id';
const META_DIMENSIONS = 'dimensions';
const META_LAST_INGESTION = 'last_ingestion';

export interface VectorIndexOptions {
	/** Embedding space the caller reads and writes in */
	space?: EmbeddingSpace;

	/** Drop every entry and the recorded embedding space before use */
	reset?: boolean;

	/** Stage failures are attributed to */
	stage?: ErrorStage;
}

export interface AddResult {
	inserted: number;
	skipped: number;
}

export interface ReplaceResult extends AddResult {
	removed: number;
}

export interface IndexStats {
	path: string;
	size: number;
	/** Entry count per corpus id */
	corpora: Record<string, number>;
	space?: EmbeddingSpace;
	lastIngestion?: IngestionReport;
}

interface ChunkRow {
	seq: number;
	id: string;
	source_id: string;
	text: string;
	char_offset: number;
	length: number;
}

interface ScoredRow extends ChunkRow {
	/** NULL when the stored vector is the zero vector */
	distance: number | null;
}

type InsertParams = [string, string, string, string, number, number, Buffer];

/**
 * Vector Index
 *
 * Each write runs in a single transaction; with the WAL journal readers see
 * either the state before or after a write.
 */
export class VectorIndex {
	private space?: EmbeddingSpace;

	private constructor(
		private readonly db: Database.Database,
		readonly location: string,
		private readonly stage: ErrorStage
	) {}

	/**
	 * Open (or create) an index
	 *
	 * @param location - Database file path or ':memory:'
	 */
	static open(location: string, options: VectorIndexOptions = {}): Result<VectorIndex, IndexUnavailableError> {
		const stage = options.stage ?? 'audit';

		const opened = trySync(
			() => {
				if (location !== ':memory:') {
					mkdirSync(path.dirname(location), { recursive: true });
				}
				const db = new Database(location);
				sqliteVec.load(db);
				db.pragma('journal_mode = WAL');
				db.pragma('synchronous = NORMAL');
				return db;
			},
			(error) =>
				new IndexUnavailableError(
					`Failed to open vector index at ${location}: ${describeError(error)}`,
					asError(error),
					stage
				)
		);
		if (opened.isErr()) {
			return err(opened.error);
		}

		const index = new VectorIndex(opened.value, location, stage);
		const prepared = index
			.migrate()
			.andThen(() => (options.reset ? index.reset() : ok(undefined)))
			.andThen(() => index.bindSpace(options.space));

		if (prepared.isErr()) {
			index.close();
			return err(prepared.error);
		}
		return ok(index);
	}

	/**
	 * Embedding space the stored vectors belong to
	 */
	get embeddingSpace(): EmbeddingSpace | undefined {
		return this.space;
	}

	/**
	 * Insert entries; entries already present in the corpus are skipped
	 */
	add(
		entries: readonly VectorIndexEntry[],
		corpusId: string = DEFAULT_CORPUS_ID
	): Result<AddResult, IndexUnavailableError> {
		return this.validateVectors(entries).andThen(() =>
			this.guard('add entries', () => this.db.transaction(() => this.insertAll(entries, corpusId))())
		);
	}

	/**
	 * Replace the entries of a corpus with a new set
	 *
	 * New entries are inserted, unchanged entries kept, and entries no longer
	 * present removed, all in one transaction.
	 */
	replaceSource(
		corpusId: string,
		entries: readonly VectorIndexEntry[]
	): Result<ReplaceResult, IndexUnavailableError> {
		return this.validateVectors(entries).andThen(() =>
			this.guard('replace corpus entries', () =>
				this.db.transaction((): ReplaceResult => {
					const counts = this.insertAll(entries, corpusId);

					const keep = new Set(entries.map((entry) => entry.chunk.id));
					const existing = this.db
						.prepare<[string], { id: string }>('SELECT id FROM chunks WHERE corpus_id = ?')
						.all(corpusId);
					const remove = this.db.prepare<[string, string]>(
						'DELETE FROM chunks WHERE corpus_id = ? AND id = ?'
					);

					let removed = 0;
					for (const row of existing) {
						if (!keep.has(row.id)) {
							removed += remove.run(corpusId, row.id).changes;
						}
					}

					return { ...counts, removed };
				})()
			)
		);
	}

	/**
	 * Top-k entries by cosine similarity, most similar first
	 *
	 * Ties keep insertion order. Returns min(k, size) results; k <= 0 yields none.
	 * Stored zero vectors rank last with similarity 0.
	 */
	query(vector: EmbeddingVector, k: number): Result<ScoredChunk[], IndexUnavailableError> {
		if (k <= 0) {
			return ok([]);
		}

		const space = this.requireSpace();
		if (space.isErr()) {
			return err(space.error);
		}
		if (vector.length !== space.value.dimensions) {
			return err(this.dimensionError(vector.length, space.value.dimensions));
		}

		const limit = Math.floor(k);

		// A zero vector has no direction: every entry is equally (dis)similar
		if (vectorNorm(vector) === 0) {
			return this.guard('query index', () =>
				this.db
					.prepare<[number], ChunkRow>(
						'SELECT seq, id, source_id, text, char_offset, length FROM chunks ORDER BY seq ASC LIMIT ?'
					)
					.all(limit)
					.map((row) => ({ chunk: toChunk(row), similarity: 0 }))
			);
		}

		return this.guard('query index', () =>
			this.db
				.prepare<[Buffer, number], ScoredRow>(
					`SELECT seq, id, source_id, text, char_offset, length,
						vec_distance_cosine(embedding, ?) AS distance
					FROM chunks
					ORDER BY distance IS NULL, distance ASC, seq ASC
					LIMIT ?`
				)
				.all(encodeEmbedding(vector), limit)
				.map((row) => ({ chunk: toChunk(row), similarity: row.distance === null ? 0 : 1 - row.distance }))
		);
	}

	/**
	 * Number of stored entries
	 */
	size(): Result<number, IndexUnavailableError> {
		return this.guard('count entries', () => this.countRows());
	}

	stats(): Result<IndexStats, IndexUnavailableError> {
		return this.guard('read index statistics', () => {
			const corpora: Record<string, number> = {};
			const rows = this.db
				.prepare<[], { corpus_id: string; count: number }>(
					'SELECT corpus_id, COUNT(*) AS count FROM chunks GROUP BY corpus_id ORDER BY corpus_id'
				)
				.all();
			for (const row of rows) {
				corpora[row.corpus_id] = row.count;
			}

			return {
				path: this.location,
				size: this.countRows(),
				corpora,
				space: this.space,
				lastIngestion: this.readLastIngestion(),
			};
		});
	}

	/**
	 * Record the report of the latest ingestion run
	 */
	recordIngestion(report: IngestionReport): Result<void, IndexUnavailableError> {
		return this.guard('record ingestion report', () => {
			this.setMeta(META_LAST_INGESTION, JSON.stringify(report));
		});
	}

	/**
	 * Remove every entry (the embedding space stays bound)
	 */
	clear(): Result<number, IndexUnavailableError> {
		return this.guard('clear index', () =>
			this.db.transaction(() => {
				this.db.prepare('DELETE FROM meta WHERE key = ?').run(META_LAST_INGESTION);
				return this.db.prepare('DELETE FROM chunks').run().changes;
			})()
		);
	}

	close(): void {
		if (this.db.open) {
			this.db.close();
		}
	}

	private migrate(): Result<void, IndexUnavailableError> {
		return this.guard('apply migrations', () => {
			this.db.exec('CREATE TABLE IF NOT EXISTS meta (key TEXT PRIMARY KEY, value TEXT NOT NULL)');
			const current = this.getMeta(META_SCHEMA_VERSION) ?? '0';

			for (const migration of MIGRATIONS) {
				if (migration.version <= current) {
					continue;
				}
				this.db.transaction(() => {
					migration.up(this.db);
					this.setMeta(META_SCHEMA_VERSION, migration.version);
				})();
			}
		});
	}

	private reset(): Result<void, IndexUnavailableError> {
		return this.guard('reset index', () => {
			this.db.transaction(() => {
				this.db.prepare('DELETE FROM chunks').run();
				this.db
					.prepare('DELETE FROM meta WHERE key IN (?, ?, ?)')
					.run(META_MODEL_ID, META_DIMENSIONS, META_LAST_INGESTION);
			})();
			this.space = undefined;
		});
	}

	/**
	 * Bind the caller's embedding space, recording it on first use
	 */
	private bindSpace(requested?: EmbeddingSpace): Result<void, IndexUnavailableError> {
		const stored = this.guard('read embedding space', () => this.readSpace());
		if (stored.isErr()) {
			return err(stored.error);
		}

		if (!requested) {
			this.space = stored.value;
			return ok(undefined);
		}

		if (stored.value) {
			const { modelId, dimensions } = stored.value;
			if (modelId !== requested.modelId || dimensions !== requested.dimensions) {
				return err(
					new IndexUnavailableError(
						`Index at ${this.location} was built with ${modelId} (${dimensions} dimensions) ` +
							`but the configured embedder is ${requested.modelId} (${requested.dimensions} dimensions). ` +
							'Re-run ingest with --reset to rebuild it.',
						undefined,
						this.stage
					)
				);
			}
		} else {
			const recorded = this.guard('record embedding space', () => {
				this.db.transaction(() => {
					this.setMeta(META_MODEL_ID, requested.modelId);
					this.setMeta(META_DIMENSIONS, String(requested.dimensions));
				})();
			});
			if (recorded.isErr()) {
				return err(recorded.error);
			}
		}

		this.space = { ...requested };
		return ok(undefined);
	}

	private insertAll(entries: readonly VectorIndexEntry[], corpusId: string): AddResult {
		const insert = this.db.prepare<InsertParams>(
			`INSERT OR IGNORE INTO chunks (id, corpus_id, source_id, text, char_offset, length, embedding)
			VALUES (?, ?, ?, ?, ?, ?, ?)`
		);

		let inserted = 0;
		for (const { chunk, vector } of entries) {
			inserted += insert.run(
				chunk.id,
				corpusId,
				chunk.sourceId,
				chunk.text,
				chunk.offset,
				chunk.length,
				encodeEmbedding(vector)
			).changes;
		}

		return { inserted, skipped: entries.length - inserted };
	}

	private validateVectors(entries: readonly VectorIndexEntry[]): Result<void, IndexUnavailableError> {
		const space = this.requireSpace();
		if (space.isErr()) {
			return err(space.error);
		}

		for (const { vector } of entries) {
			if (vector.length !== space.value.dimensions) {
				return err(this.dimensionError(vector.length, space.value.dimensions));
			}
		}
		return ok(undefined);
	}

	private requireSpace(): Result<EmbeddingSpace, IndexUnavailableError> {
		if (!this.space) {
			return err(
				new IndexUnavailableError(
					`Index at ${this.location} has no embedding space; open it with an embedder first`,
					undefined,
					this.stage
				)
			);
		}
		return ok(this.space);
	}

	private dimensionError(actual: number, expected: number): IndexUnavailableError {
		return new IndexUnavailableError(
			`Vector dimension mismatch: expected ${expected}, got ${actual}`,
			undefined,
			this.stage
		);
	}

	private countRows(): number {
		const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM chunks').get();
		return row?.count ?? 0;
	}

	private readSpace(): EmbeddingSpace | undefined {
		const modelId = this.getMeta(META_MODEL_ID);
		const dimensions = Number(this.getMeta(META_DIMENSIONS));
		if (modelId === undefined || !Number.isInteger(dimensions) || dimensions <= 0) {
			return undefined;
		}
		return { modelId, dimensions };
	}

	private readLastIngestion(): IngestionReport | undefined {
		const raw = this.getMeta(META_LAST_INGESTION);
		if (raw === undefined) {
			return undefined;
		}
		const parsed = IngestionReportSchema.safeParse(JSON.parse(raw));
		return parsed.success ? parsed.data : undefined;
	}

	private getMeta(key: string): string | undefined {
		return this.db.prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?').get(key)?.value;
	}

	private setMeta(key: string, value: string): void {
		this.db
			.prepare<[string, string]>(
				'INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
			)
			.run(key, value);
	}

	private guard<T>(action: string, fn: () => T): Result<T, IndexUnavailableError> {
		return trySync(
			fn,
			(error) =>
				new IndexUnavailableError(`Failed to ${action}: ${describeError(error)}`, asError(error), this.stage)
		);
	}
}

function toChunk(row: ChunkRow): RegulationChunk {
	return Object.freeze({
		id: row.id,
		sourceId: row.source_id,
		text: row.text,
		offset: row.char_offset,
		length: row.length,
	});
}
