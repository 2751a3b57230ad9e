// test/helpers.ts
import type { FetchLike } from '../src/index.js';

export interface RecordedRequest {
    url: string;
    init: RequestInit | undefined;
}

/** Builds a response whose `url` reads as the final URL after redirects. */
export const respond = (
    body: string,
    init: { status?: number; statusText?: string; url?: string } = {}
): Response => {
    const response = new Response(body, { status: init.status ?? 200, statusText: init.statusText ?? '' });
    if (init.url !== undefined) {
        Object.defineProperty(response, 'url', { value: init.url });
    }
    return response;
};

/** An export document holding `text` in its `<text>` element. */
export const exportXml = (title: string, text: string): string =>
    `<mediawiki><page><title>${title}</title><revision><text>${text}</text></revision></page></mediawiki>`;

/**
 * In-process stand-in for a wiki: the random URL redirects to the next of
 * `titles`, and export URLs serve `texts[title]`.
 */
export const fakeWiki = (options: {
    randomUrl: string;
    exportUrl: string;
    articleBaseUrl: string;
    titles: string[];
    texts: Record<string, string>;
}): { fetch: FetchLike; requests: RecordedRequest[]; redirects: Response[] } => {
    const requests: RecordedRequest[] = [];
    const redirects: Response[] = [];
    let next = 0;
    const fetch: FetchLike = async (input, init) => {
        const url = String(input);
        requests.push({ url, init });
        if (url.startsWith(options.exportUrl)) {
            const title = decodeURIComponent(url.slice(options.exportUrl.length));
            return respond(exportXml(title, options.texts[title] ?? ''));
        }
        if (url === options.randomUrl) {
            const title = options.titles[next++];
            const redirect = respond('<html></html>', { url: `${options.articleBaseUrl}${encodeURIComponent(title)}` });
            redirects.push(redirect);
            return redirect;
        }
        return respond('', { status: 404, statusText: 'Not Found' });
    };
    return { fetch, requests, redirects };
};
