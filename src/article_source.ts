/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { getConfig } from './config.js';
import { ArticleRetrievalError, MarkupError } from './errors.js';
import { getLog } from './logger.js';
import { extractMarkupText, stripMarkup } from './markup.js';

export type FetchLike = typeof fetch;

/**
 * Where and how articles are requested. Unset fields come from config.
 */
export interface ArticleSourceOptions {
	/** URL that redirects to a random article. */
	randomUrl?: string;
	/** Prefix the article title is appended to for the XML export. */
	exportUrl?: string;
	/** Sent as `User-Agent`; Wikipedia refuses the runtime's default one. */
	userAgent?: string;
	/** Abort timeout per request. */
	requestTimeoutMs?: number;
	/** Injected for tests. Defaults to the global `fetch`. */
	fetch?: FetchLike;
}

function resolveOptions(options?: ArticleSourceOptions): Required<ArticleSourceOptions> {
	const config = getConfig();
	return {
		randomUrl: config.COINCIDENCE_RANDOM_URL,
		exportUrl: config.COINCIDENCE_EXPORT_URL,
		userAgent: config.COINCIDENCE_USER_AGENT,
		requestTimeoutMs: config.COINCIDENCE_TIMEOUT_MS,
		fetch: globalThis.fetch,
		...options,
	};
}

/**
 * A downloaded article: its title and the raw XML export.
 */
export class Article {
	constructor(
		readonly title: string,
		readonly markup: string,
	) {}

	/**
	 * Parses the export and returns the article text with markup stripped.
	 * @throws {ArticleRetrievalError} If the export is malformed or has no text element.
	 */
	getText(): string {
		let text: string | null;
		try {
			text = extractMarkupText(this.markup);
		} catch (err) {
			if (err instanceof MarkupError) {
				throw new ArticleRetrievalError(`export of "${this.title}" is not valid XML`, { cause: err });
			}
			throw err;
		}
		if (text === null) {
			throw new ArticleRetrievalError(`export of "${this.title}" has no text`);
		}
		return stripMarkup(text);
	}
}

function describeFailure(url: string, err: unknown, timeoutMs: number): string {
	if (err instanceof Error) {
		if (err.name === 'TimeoutError') {
			return `request to ${url} timed out after ${timeoutMs} ms`;
		}
		// undici reports "fetch failed" and keeps the socket error as cause
		const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
		return `${err.message}${cause}`;
	}
	return String(err);
}

async function request(url: string, config: Required<ArticleSourceOptions>): Promise<Response> {
	let response: Response;
	try {
		response = await config.fetch(url, {
			headers: { 'User-Agent': config.userAgent },
			redirect: 'follow',
			signal: AbortSignal.timeout(config.requestTimeoutMs),
		});
	} catch (err) {
		throw new ArticleRetrievalError(describeFailure(url, err, config.requestTimeoutMs), { cause: err });
	}
	if (!response.ok) {
		throw new ArticleRetrievalError(`${url} responded with ${response.status} ${response.statusText}`.trimEnd());
	}
	return response;
}

/**
 * Takes the title from the last path segment of an article URL.
 * Returns the segment still percent-encoded, ready to append to the export URL.
 */
export function titleFromUrl(url: string): string | null {
	if (!URL.canParse(url)) return null;
	const segment = new URL(url).pathname.split('/').pop();
	return segment ? segment : null;
}

function decodeTitle(segment: string): string {
	try {
		return decodeURIComponent(segment);
	} catch (err) {
		if (err instanceof URIError) return segment;
		throw err;
	}
}

/**
 * Downloads one random article.
 *
 * The random URL redirects to an article; its title is read from the end of
 * the final URL. The export URL then returns the same article with less of
 * the page boilerplate around it.
 *
 * @throws {ArticleRetrievalError} On network failure, timeout, non-2xx status or a redirect without a title.
 */
export async function fetchRandomArticle(options?: ArticleSourceOptions): Promise<Article> {
	const log = getLog(import.meta);
	const config = resolveOptions(options);

	log.debug(`GET ${config.randomUrl}`);
	const redirect = await request(config.randomUrl, config);
	const slug = titleFromUrl(redirect.url);
	// Only the final URL is needed, not the article page itself
	await redirect.body?.cancel();
	if (slug === null) {
		throw new ArticleRetrievalError(`no article title in redirect to "${redirect.url}"`);
	}

	const exportUrl = `${config.exportUrl}${slug}`;
	log.debug(`GET ${exportUrl}`);
	const response = await request(exportUrl, config);
	let markup: string;
	try {
		markup = await response.text();
	} catch (err) {
		throw new ArticleRetrievalError(describeFailure(exportUrl, err, config.requestTimeoutMs), { cause: err });
	}
	log.info(`Retrieved "${slug}" (${markup.length} chars)`);

	return new Article(decodeTitle(slug), markup);
}

/**
 * Downloads `count` random articles, one after another.
 */
export async function fetchRandomArticles(count: number, options?: ArticleSourceOptions): Promise<Article[]> {
	const articles: Article[] = [];
	for (let index = 0; index < count; index++) {
		articles.push(await fetchRandomArticle(options));
	}
	return articles;
}
