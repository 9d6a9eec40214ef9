/**
 * Audit Error Hierarchy
 *
 * Every failure the pipeline can surface is one of these classes. The `stage`
 * tells the CLI whether the failure belongs to corpus ingestion or to an audit
 * run, since the remediation differs (retry the download later vs. check the
 * model credentials or quota).
 */

/**
 * Pipeline stage an error is attributed to
 */
export type ErrorStage = 'ingest' | 'audit' | 'config';

/**
 * Base error class for all pipeline errors
 */
export abstract class AuditError extends Error {
	abstract readonly code: string;
	abstract readonly retryable: boolean;
	readonly timestamp: Date = new Date();

	constructor(
		message: string,
		public readonly stage: ErrorStage,
		public override cause?: Error
	) {
		super(message);
		this.name = this.constructor.name;
		Object.setPrototypeOf(this, new.target.prototype);
	}

	/**
	 * Serializable form for JSON output and log entries
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			stage: this.stage,
			retryable: this.retryable,
			message: this.message,
			cause: this.cause?.message,
		};
	}
}

/**
 * Regulatory source could not be fetched (network, HTTP status or timeout)
 */
export class SourceUnavailableError extends AuditError {
	readonly code = 'SOURCE_UNAVAILABLE';
	readonly retryable = true;

	constructor(message: string, cause?: Error, public readonly status?: number) {
		super(message, 'ingest', cause);
	}
}

/**
 * Retrieved regulatory markup could not be turned into text
 */
export class ParseError extends AuditError {
	readonly code = 'PARSE_ERROR';
	readonly retryable = false;

	constructor(message: string, cause?: Error) {
		super(message, 'ingest', cause);
	}
}

/**
 * Vector store unreachable, corrupt or built for another embedding space
 */
export class IndexUnavailableError extends AuditError {
	readonly code = 'INDEX_UNAVAILABLE';
	readonly retryable = false;

	constructor(message: string, cause?: Error, stage: ErrorStage = 'audit') {
		super(message, stage, cause);
	}
}

/**
 * Language model or embedding service call failed or timed out
 */
export class ModelUnavailableError extends AuditError {
	readonly code = 'MODEL_UNAVAILABLE';
	readonly retryable = true;

	constructor(message: string, cause?: Error, stage: ErrorStage = 'audit') {
		super(message, stage, cause);
	}
}

/**
 * Empty or malformed caller input
 */
export class InvalidInputError extends AuditError {
	readonly code = 'INVALID_INPUT';
	readonly retryable = false;

	constructor(message: string, stage: ErrorStage = 'audit') {
		super(message, stage);
	}
}

/**
 * Invalid or incomplete configuration
 */
export class ConfigError extends AuditError {
	readonly code = 'CONFIG_ERROR';
	readonly retryable = false;

	constructor(message: string) {
		super(message, 'config');
	}
}

export function isAuditError(error: unknown): error is AuditError {
	return error instanceof AuditError;
}
