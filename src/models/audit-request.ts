/**
 * Audit Request Model
 *
 * The request-scoped state threaded through the pipeline. Each stage is its
 * own immutable record; a transition returns the next record rather than
 * mutating the previous one.
 *
 *   pending -> retrieved -> audited
 */

/**
 * Quality warnings attached to a completed audit
 */
export type AuditWarning = 'empty_context';

export interface PendingAudit {
	readonly stage: 'pending';
	readonly protocolText: string;
}

export interface RetrievedAudit {
	readonly stage: 'retrieved';
	readonly protocolText: string;

	/** Chunk texts in descending similarity order, length <= k */
	readonly retrievedRegulations: readonly string[];
}

export interface CompletedAudit {
	readonly stage: 'audited';
	readonly protocolText: string;
	readonly retrievedRegulations: readonly string[];

	/** Narrative produced by the language model, unmodified */
	readonly auditResults: string;

	/** Reserved for a future scoring step; never populated */
	readonly complianceScore: null;

	readonly warnings: readonly AuditWarning[];
}

export type AuditRequest = PendingAudit | RetrievedAudit | CompletedAudit;

export function createAuditRequest(protocolText: string): PendingAudit {
	return { stage: 'pending', protocolText };
}

export function withRetrievedRegulations(
	request: PendingAudit,
	retrievedRegulations: readonly string[]
): RetrievedAudit {
	return {
		stage: 'retrieved',
		protocolText: request.protocolText,
		retrievedRegulations: [...retrievedRegulations],
	};
}

export function withAuditResults(
	request: RetrievedAudit,
	auditResults: string,
	warnings: readonly AuditWarning[] = []
): CompletedAudit {
	return {
		stage: 'audited',
		protocolText: request.protocolText,
		retrievedRegulations: request.retrievedRegulations,
		auditResults,
		complianceScore: null,
		warnings: [...warnings],
	};
}
