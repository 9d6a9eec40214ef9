/**
 * Regulation Document Model
 *
 * Plain-text rendering of one regulatory part as extracted from its
 * structured markup, with the section boundaries kept for traceability.
 */

/**
 * Identifies one regulatory part at a point in time
 */
export interface SourceLocator {
	/** CFR title number (21 = Food and Drugs) */
	title: number;

	/** Part within the title (11 = Electronic Records; Electronic Signatures) */
	part: number;

	/** Point-in-time snapshot date (YYYY-MM-DD) */
	date: string;
}

/**
 * A section span within the extracted text
 */
export interface RegulationSection {
	/** Section reference, e.g. "§ 11.10" */
	id: string;

	/** Section heading as printed, e.g. "§ 11.10 Controls for closed systems." */
	heading: string;

	/** Character offset of the heading within RegulationDocument.text */
	offset: number;

	/** Length of the section (heading and body) in characters */
	length: number;
}

/**
 * Extracted regulatory part
 */
export interface RegulationDocument {
	/** Corpus identifier, e.g. "title-21-part-11" */
	corpusId: string;

	/** Part heading, e.g. "PART 11—ELECTRONIC RECORDS; ELECTRONIC SIGNATURES" */
	title: string;

	/** Human-readable text with markup removed */
	text: string;

	/** Sections in document order */
	sections: RegulationSection[];
}

/**
 * Build the corpus identifier for a title/part pair
 */
export function corpusIdFor(locator: Pick<SourceLocator, 'title' | 'part'>): string {
	return `title-${locator.title}-part-${locator.part}`;
}
