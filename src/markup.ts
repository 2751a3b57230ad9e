/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { MarkupError } from './errors.js';

const BRACKETS = String.raw`\[[^\[\]]*\]`;
const DOUBLE_BRACKETS = String.raw`\[\[[^\[\]]*\]\]`;
const DOUBLE_BRACES = String.raw`\{\{[^{}]*\}\}`;
const EQUAL_SIGNS = String.raw`==[^=]*==`;

const MARKUP_PATTERN = new RegExp([BRACKETS, DOUBLE_BRACKETS, DOUBLE_BRACES, EQUAL_SIGNS].join('|'), 'g');

/**
 * Removes wiki markup such as `[this]`, `[[that]]`, `{{those}}` and `==the other==`.
 *
 * What sits inside these delimiters is mostly boilerplate (links, templates,
 * headings) shared by many articles, which would otherwise dominate the
 * longest common substring. Only innermost constructs are removed; a
 * template nested in a template leaves its outer braces behind.
 */
export function stripMarkup(text: string): string {
	return text.replace(MARKUP_PATTERN, '');
}

function isElementMap(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Depth-first search, in document order, for the first element whose tag
 * ends with "text". Walks the `preserveOrder` output of the parser: an array
 * of nodes, each `{ tag: children }` or `{ '#text': value }`. Parser
 * bookkeeping keys (`#text`, `:@`, `?xml`) are not elements.
 */
function findTextElement(nodes: unknown): unknown[] | undefined {
	if (!Array.isArray(nodes)) return undefined;
	for (const node of nodes) {
		if (!isElementMap(node)) continue;
		for (const [tag, children] of Object.entries(node)) {
			if (tag.startsWith('#') || tag.startsWith(':') || tag.startsWith('?')) continue;
			if (tag.endsWith('text')) {
				return Array.isArray(children) ? children : [];
			}
			const found = findTextElement(children);
			if (found) return found;
		}
	}
	return undefined;
}

/**
 * The text before the element's first child element, unchanged.
 */
function textContent(children: unknown[]): string | null {
	let text = '';
	for (const child of children) {
		if (!isElementMap(child) || !('#text' in child)) break;
		const value = child['#text'];
		text += typeof value === 'string' ? value : String(value);
	}
	return text === '' ? null : text;
}

/**
 * Parses an XML document and returns the text of the first element whose
 * name ends with `text` (namespace prefixes are ignored), e.g. the
 * `<text>` element of a MediaWiki export.
 *
 * @returns The element's text, or `null` if there is no such element or it is empty.
 * @throws {MarkupError} If the document is not well-formed.
 */
export function extractMarkupText(xml: string): string | null {
	const validation = XMLValidator.validate(xml);
	if (validation !== true) {
		const { msg, line, col } = validation.err;
		throw new MarkupError(`Malformed XML at ${line}:${col}: ${msg}`);
	}

	const parser = new XMLParser({
		ignoreAttributes: true,
		ignoreDeclaration: true,
		removeNSPrefix: true,
		parseTagValue: false,
		trimValues: false,
		preserveOrder: true,
	});
	const parsed: unknown = parser.parse(xml);
	const found = findTextElement(parsed);
	return found ? textContent(found) : null;
}
