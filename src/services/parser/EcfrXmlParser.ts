/**
 * eCFR XML Parser
 *
 * Converts the eCFR versioner's XML rendering of a regulatory part into
 * plain text. Headings and paragraphs become blank-line separated blocks,
 * inline markup is flattened into its text, and every DIV8 TYPE="SECTION"
 * is recorded as a section span over the resulting text.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { Result, ok, err, trySync, asError, describeError } from '../../lib/result-types.js';
import { ParseError } from '../../lib/errors.js';
import type { RegulationDocument, RegulationSection } from '../../models/regulation-document.js';

/**
 * Element with preserveOrder layout: `{ TAG: children, ':@': attributes }`
 */
type OrderedNode = Record<string, unknown>;

const TEXT_KEY = '#text';
const ATTRIBUTES_KEY = ':@';

/** Elements rendered as one paragraph each */
const BLOCK_TAGS = new Set([
	'HEAD',
	'HED',
	'P',
	'FP',
	'PSPACE',
	'CITA',
	'SECAUTH',
	'EDNOTE',
	'GPH',
]);

/** Elements without readable content */
const SKIPPED_TAGS = new Set(['PRTPAGE', 'FTREF', 'img', 'GID']);

const PARAGRAPH_SEPARATOR = '\n\n';

interface WalkState {
	paragraphs: string[];
	offsets: number[];
	length: number;
	sections: Array<{ id: string; firstParagraph: number; lastParagraph: number }>;
	partHeading?: string;
}

export class EcfrXmlParser {
	private readonly parser = new XMLParser({
		preserveOrder: true,
		ignoreAttributes: false,
		attributeNamePrefix: '',
		trimValues: false,
		parseTagValue: false,
		parseAttributeValue: false,
		processEntities: true,
		htmlEntities: true,
	});

	/**
	 * Parse eCFR XML into a RegulationDocument
	 *
	 * @param xml - Raw XML payload
	 * @param corpusId - Identifier recorded on the document
	 */
	parse(xml: string, corpusId: string): Result<RegulationDocument, ParseError> {
		if (xml.trim().length === 0) {
			return err(new ParseError('Regulatory source payload is empty'));
		}

		const validation = XMLValidator.validate(xml);
		if (validation !== true) {
			const { msg, line } = validation.err;
			return err(new ParseError(`Malformed regulatory XML at line ${line}: ${msg}`));
		}

		const tree = trySync(
			(): unknown => this.parser.parse(xml),
			(error) => new ParseError(`Failed to parse regulatory XML: ${describeError(error)}`, asError(error))
		);
		if (tree.isErr()) {
			return err(tree.error);
		}

		const state: WalkState = { paragraphs: [], offsets: [], length: 0, sections: [] };
		this.walk(toNodes(tree.value), state);

		if (state.paragraphs.length === 0) {
			return err(new ParseError('Regulatory XML contained no readable text'));
		}

		const text = state.paragraphs.join(PARAGRAPH_SEPARATOR);
		const sections: RegulationSection[] = [];
		for (const span of state.sections) {
			const start = state.offsets[span.firstParagraph];
			const lastStart = state.offsets[span.lastParagraph];
			const last = state.paragraphs[span.lastParagraph];
			const heading = state.paragraphs[span.firstParagraph];
			if (start === undefined || lastStart === undefined || last === undefined || heading === undefined) {
				continue;
			}
			sections.push({
				id: span.id,
				heading,
				offset: start,
				length: lastStart + last.length - start,
			});
		}

		return ok({
			corpusId,
			title: state.partHeading ?? state.paragraphs[0] ?? corpusId,
			text,
			sections,
		});
	}

	private walk(nodes: OrderedNode[], state: WalkState): void {
		for (const node of nodes) {
			const tag = tagOf(node);
			if (tag === undefined) {
				continue;
			}

			if (tag === TEXT_KEY) {
				// Loose text directly inside a container
				this.pushParagraph(state, textOf(node));
				continue;
			}

			if (SKIPPED_TAGS.has(tag)) {
				continue;
			}

			const children = toNodes(node[tag]);
			const attributes = attributesOf(node);

			if (BLOCK_TAGS.has(tag)) {
				this.pushParagraph(state, flatten(children));
				continue;
			}

			if (attributes.TYPE === 'SECTION') {
				const id = sectionId(attributes.N, children);
				const firstParagraph = state.paragraphs.length;
				this.walk(children, state);
				if (state.paragraphs.length > firstParagraph) {
					state.sections.push({ id, firstParagraph, lastParagraph: state.paragraphs.length - 1 });
				}
				continue;
			}

			if (attributes.TYPE === 'PART' && state.partHeading === undefined) {
				const head = children.find((child) => tagOf(child) === 'HEAD');
				if (head) {
					state.partHeading = collapse(flatten(toNodes(head.HEAD)));
				}
			}

			this.walk(children, state);
		}
	}

	/**
	 * Append a paragraph unless it is blank
	 */
	private pushParagraph(state: WalkState, raw: string): void {
		const paragraph = collapse(raw);
		if (paragraph.length === 0) {
			return;
		}
		const offset = state.paragraphs.length === 0 ? 0 : state.length + PARAGRAPH_SEPARATOR.length;
		state.offsets.push(offset);
		state.paragraphs.push(paragraph);
		state.length = offset + paragraph.length;
	}
}

/**
 * Flatten inline markup into its text content
 */
function flatten(nodes: OrderedNode[]): string {
	let text = '';
	for (const node of nodes) {
		const tag = tagOf(node);
		if (tag === undefined || SKIPPED_TAGS.has(tag)) {
			continue;
		}
		text += tag === TEXT_KEY ? textOf(node) : flatten(toNodes(node[tag]));
	}
	return text;
}

function collapse(text: string): string {
	return text.replace(/\s+/g, ' ').trim();
}

/**
 * Section reference from the N attribute or the heading, e.g. "§ 11.10"
 */
function sectionId(n: string | undefined, children: OrderedNode[]): string {
	const fromAttribute = n?.trim();
	if (fromAttribute) {
		return fromAttribute.startsWith('§') ? fromAttribute : `§ ${fromAttribute}`;
	}
	const head = children.find((child) => tagOf(child) === 'HEAD');
	const heading = head ? collapse(flatten(toNodes(head.HEAD))) : '';
	const match = /§\s*([\d.]+\d)/.exec(heading);
	return match?.[1] ? `§ ${match[1]}` : heading || 'unknown section';
}

function isNode(value: unknown): value is OrderedNode {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNodes(value: unknown): OrderedNode[] {
	return Array.isArray(value) ? value.filter(isNode) : [];
}

function tagOf(node: OrderedNode): string | undefined {
	return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
}

function textOf(node: OrderedNode): string {
	const value = node[TEXT_KEY];
	return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}

function attributesOf(node: OrderedNode): Record<string, string | undefined> {
	const raw = node[ATTRIBUTES_KEY];
	const attributes: Record<string, string | undefined> = {};
	if (isNode(raw)) {
		for (const [key, value] of Object.entries(raw)) {
			if (typeof value === 'string') {
				attributes[key] = value;
			}
		}
	}
	return attributes;
}
