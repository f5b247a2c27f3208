import { JSDOM } from 'jsdom';
import pLimit from 'p-limit';
import type { DocsStore, DocumentRecord } from './db.js';
import { extractPage, parseReferencePage } from './extract.js';
import { createLogger, errorMessage } from './log.js';
import type { Logger } from './log.js';

const USER_AGENT = 'datatables-docs-mcp/1.0 Documentation Indexer';
const FETCH_TIMEOUT_MS = 30_000;

export type IndexSource = 'reference' | 'examples';
export const INDEX_SOURCES: readonly IndexSource[] = ['reference', 'examples'];

const REFERENCE_CATEGORIES: Record<string, string> = {
    option: 'Options',
    api: 'API',
    event: 'Events',
    button: 'Buttons',
    feature: 'Features',
    type: 'Types',
    content: 'Content',
};

const EXAMPLE_CATEGORIES: Record<string, string> = {
    basic_init: 'Basic initialisation',
    advanced_init: 'Advanced initialisation',
    data_sources: 'Data sources',
    i18n: 'Internationalisation',
    datetime: 'DateTime',
    'plug-ins': 'Plug-ins',
    styling: 'Styling',
    layout: 'Layout',
    api: 'API',
    ajax: 'Ajax',
    server_side: 'Server-side',
};

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface IndexerOptions {
    baseUrl: string;
    concurrency: number;
    /** Re-fetch pages that are already in the index. */
    force?: boolean;
    sources?: readonly IndexSource[];
    fetch?: FetchLike;
    logger?: Logger;
}

export interface IndexReport {
    discovered: number;
    indexed: number;
    skipped: number;
    failed: number;
}

interface PageTarget {
    url: string;
    title: string;
    category: string;
    source: IndexSource;
}

/**
 * Scrapes the DataTables reference and example pages into the store.
 *
 * Each source runs in two passes: category index pages are fetched to discover
 * page links, then every page not already indexed is fetched and stored.
 * A failing page is logged and counted; it never aborts the run.
 */
export class DocumentationIndexer {
    private readonly fetchImpl: FetchLike;
    private readonly log: Logger;

    constructor(
        private readonly store: DocsStore,
        private readonly options: IndexerOptions,
    ) {
        this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
        this.log = options.logger ?? createLogger('indexer');
    }

    async indexAll(): Promise<IndexReport> {
        const report: IndexReport = { discovered: 0, indexed: 0, skipped: 0, failed: 0 };

        for (const source of this.options.sources ?? INDEX_SOURCES) {
            const targets = await this.discover(source);
            report.discovered += targets.length;
            this.log(`${source}: ${targets.length} pages discovered`);

            const limit = pLimit(this.options.concurrency);
            let done = 0;
            const results = await Promise.all(targets.map(target => limit(async () => {
                const status = await this.indexPage(target);
                done++;
                this.log(`[${done}/${targets.length}] ${status.toUpperCase()} ${target.category} - ${target.title}`);
                return status;
            })));

            for (const status of results) report[status]++;
        }

        this.log(`Done: ${report.indexed} indexed, ${report.skipped} skipped, ${report.failed} failed`);
        return report;
    }

    // ── Discovery ──────────────────────────────────────────────────────────────

    private async discover(source: IndexSource): Promise<PageTarget[]> {
        const categories = source === 'reference' ? REFERENCE_CATEGORIES : EXAMPLE_CATEGORIES;
        const prefix = source === 'reference' ? 'reference' : 'examples';
        const found = new Map<string, PageTarget>();

        for (const [slug, category] of Object.entries(categories)) {
            const categoryUrl = `${this.options.baseUrl}/${prefix}/${slug}/`;
            let html: string;
            try {
                html = await this.fetchHtml(categoryUrl);
            } catch (err) {
                this.log(`Error discovering ${category}: ${errorMessage(err)}`);
                continue;
            }

            for (const link of collectLinks(html, categoryUrl)) {
                if (!isPageLink(link.url, categoryUrl, source)) continue;
                const existing = found.get(link.url);
                if (existing) {
                    // Thumbnail links come without text; keep the first labelled one
                    existing.title ||= link.title;
                    continue;
                }
                found.set(link.url, { url: link.url, title: link.title, category, source });
            }
        }

        return [...found.values()];
    }

    // ── Pages ──────────────────────────────────────────────────────────────────

    private async indexPage(target: PageTarget): Promise<'indexed' | 'skipped' | 'failed'> {
        if (!this.options.force && this.store.isIndexed(target.url)) return 'skipped';

        try {
            const html = await this.fetchHtml(target.url);
            const record = target.source === 'reference'
                ? buildReferenceRecord(html, target)
                : buildExampleRecord(html, target);

            if (!record) {
                this.log(`Warning: no content extracted from ${target.url}`);
                return 'failed';
            }
            this.store.saveDocument(record);
            return 'indexed';
        } catch (err) {
            this.log(`Error indexing ${target.url}: ${errorMessage(err)}`);
            return 'failed';
        }
    }

    private async fetchHtml(url: string): Promise<string> {
        const res = await this.fetchImpl(url, {
            headers: { 'User-Agent': USER_AGENT },
            signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
        });
        if (!res.ok) {
            throw new Error(`HTTP ${res.status} for ${url}`);
        }
        return res.text();
    }
}

function buildReferenceRecord(html: string, target: PageTarget): DocumentRecord | null {
    const page = extractPage(html, target.url);
    if (!page.content) return null;

    const details = parseReferencePage(html);
    return {
        title: target.title || page.title,
        url: target.url,
        content: page.content,
        section: target.category,
        doc_type: 'reference',
        ...details,
        examples: details.examples.length > 0 ? details.examples : page.codeExamples,
    };
}

function buildExampleRecord(html: string, target: PageTarget): DocumentRecord | null {
    const page = extractPage(html, target.url);
    if (!page.content && page.codeExamples.length === 0) return null;

    return {
        title: target.title || page.title,
        url: target.url,
        content: page.content,
        section: target.category,
        doc_type: 'example',
        examples: page.codeExamples,
    };
}

// ── Link helpers ───────────────────────────────────────────────────────────────

export interface Link {
    url: string;
    title: string;
}

/** All anchors on the page, resolved to absolute URLs without fragments. */
export function collectLinks(html: string, pageUrl: string): Link[] {
    const document = new JSDOM(html).window.document;
    const links: Link[] = [];

    for (const anchor of Array.from(document.querySelectorAll('a'))) {
        const href = anchor.getAttribute('href');
        if (!href || href.startsWith('#') || href.startsWith('javascript:')) continue;
        if (!URL.canParse(href, pageUrl)) continue;

        const u = new URL(href, pageUrl);
        u.hash = '';
        links.push({ url: u.href, title: (anchor.textContent ?? '').replace(/\s+/g, ' ').trim() });
    }
    return links;
}

/**
 * Reference pages sit one segment below their category
 * (`/reference/api/ajax.reload()`); example pages are `.html` files in theirs.
 */
export function isPageLink(url: string, categoryUrl: string, source: IndexSource): boolean {
    const target = new URL(url);
    const category = new URL(categoryUrl);
    if (target.origin !== category.origin || target.search) return false;
    if (!target.pathname.startsWith(category.pathname)) return false;

    const rest = target.pathname.slice(category.pathname.length);
    if (!rest || rest.includes('/')) return false;

    if (source === 'examples') {
        return rest.endsWith('.html') && rest !== 'index.html';
    }
    return true;
}
