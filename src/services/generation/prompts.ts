/**
 * Audit prompt template
 */

export const NO_CONTEXT_NOTICE =
	'(No regulatory context was retrieved. State that the audit is not grounded in retrieved regulations.)';

export const CONTEXT_SEPARATOR = '\n\n';

/**
 * Render the auditor prompt for a protocol and its retrieved regulations
 *
 * Regulations are inserted verbatim, in retrieval order.
 */
export function buildAuditPrompt(protocolText: string, regulations: readonly string[]): string {
	const context = regulations.length > 0 ? regulations.join(CONTEXT_SEPARATOR) : NO_CONTEXT_NOTICE;

	return `
You are a Senior FDA Regulatory Auditor specializing in 21 CFR Part 11.
Your task is to review the following Clinical Trial Protocol snippet against the provided regulations.

REGULATORY CONTEXT (21 CFR Part 11):
${context}

PROTOCOL SNIPPET:
${protocolText}

INSTRUCTIONS:
1. Identify missing requirements for electronic signatures or audit trails.
2. Flag "Red Zone" risks where data integrity is at stake.
3. Be concise and use professional clinical terminology.
`;
}
