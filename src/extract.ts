import { JSDOM } from 'jsdom';
import TurndownService from 'turndown';
import { gfm } from 'turndown-plugin-gfm';
import type {
    CodeExampleRecord,
    ParameterRecord,
    RelatedRecord,
    TypeRecord,
} from './db.js';
import { RELATED_CATEGORIES } from './db.js';

const turndownService = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
});

// GitHub Flavored Markdown keeps option/parameter tables readable
turndownService.use(gfm);

turndownService.addRule('fencedCodeBlock', {
    filter(node) {
        return node.nodeName === 'PRE' && node.firstElementChild?.nodeName === 'CODE';
    },
    replacement(content, node) {
        const codeEl = node.querySelector('code');
        if (!codeEl) return content;
        const lang = detectLanguage(codeEl.className) ?? '';
        return `\n\`\`\`${lang}\n${codeEl.textContent ?? ''}\n\`\`\`\n`;
    },
});

const LANGUAGE_ALIASES: Record<string, string> = {
    js: 'javascript',
    ts: 'typescript',
    htm: 'html',
    xml: 'html',
    sh: 'bash',
};

/**
 * Detects the language from a code element's class list
 * (`language-js`, `lang-html`, Highlight.js `hljs language-css`, ...).
 * Returns null when no language class is present.
 */
export function detectLanguage(className: string): string | null {
    const match = className.match(/\b(?:language|lang)-(\w[\w.-]*)/i);
    if (!match) return null;
    const lang = match[1].toLowerCase();
    return LANGUAGE_ALIASES[lang] ?? lang;
}

// ── Page content ───────────────────────────────────────────────────────────────

const CONTENT_SELECTORS = ['.doc-content', 'article', 'main'];
const NOISE_SELECTORS = 'script, style, nav, .navigation, .sidebar';

export interface ExtractedPage {
    title: string;
    /** Main content converted to Markdown. Empty when the page had no text. */
    content: string;
    codeExamples: CodeExampleRecord[];
}

/**
 * Extracts the main content of a documentation page as Markdown, along with
 * every `pre code` block as a standalone example.
 */
export function extractPage(html: string, url: string): ExtractedPage {
    const document = new JSDOM(html, { url }).window.document;

    const title = text(document.querySelector('h1')) || document.title.trim();

    const codeExamples: CodeExampleRecord[] = [];
    document.querySelectorAll('pre code').forEach(codeEl => {
        const code = (codeEl.textContent ?? '').trim();
        if (!code) return;
        codeExamples.push({
            title: null,
            code,
            language: detectLanguage(codeEl.className) ?? 'javascript',
        });
    });

    document.querySelectorAll(NOISE_SELECTORS).forEach(el => el.remove());

    let container: Element | null = null;
    for (const selector of CONTENT_SELECTORS) {
        container = document.querySelector(selector);
        if (container) break;
    }
    const sourceHtml = (container ?? document.body)?.innerHTML ?? '';
    const content = turndownService.turndown(sourceHtml).trim();

    return { title, content, codeExamples };
}

// ── Reference pages ────────────────────────────────────────────────────────────

export interface ReferenceDetails {
    signature: string | null;
    since_version: string | null;
    summary: string | null;
    parameters: ParameterRecord[];
    returns: TypeRecord | null;
    value_types: TypeRecord[];
    examples: CodeExampleRecord[];
    related: RelatedRecord;
    notes: string[];
}

/**
 * Pulls the structured fields out of a DataTables reference page
 * (API method, option or event). Fields that are absent come back empty.
 */
export function parseReferencePage(html: string): ReferenceDetails {
    const document = new JSDOM(html).window.document;

    return {
        signature: extractSignature(document),
        since_version: extractSinceVersion(document),
        summary: extractSummary(document),
        parameters: extractParameters(document),
        returns: extractReturnType(document),
        value_types: extractValueTypes(document),
        examples: extractReferenceExamples(document),
        related: extractRelatedItems(document),
        notes: extractNotes(document),
    };
}

function extractSignature(document: Document): string | null {
    for (const selector of ['.api-signature', 'code.signature', 'pre.signature', '.method-signature']) {
        const value = text(document.querySelector(selector));
        if (value) return value;
    }

    // API method pages title themselves with the call, e.g. "ajax.reload( callback, resetPaging )"
    const heading = text(document.querySelector('h1'));
    if (/^[a-zA-Z0-9_.()]+\s*\(.*\)/.test(heading)) return heading;
    return null;
}

function extractSinceVersion(document: Document): string | null {
    const match = (document.body?.textContent ?? '').match(/Since:\s*DataTables\s+(\d+(?:\.\d+)*)/i);
    return match ? match[1] : null;
}

function extractSummary(document: Document): string | null {
    const heading = document.querySelector('h2[data-anchor="Description"]');
    if (heading) {
        const paragraph = text(nextSibling(heading, el => el.tagName === 'P'));
        if (paragraph) return paragraph;
    }

    for (const selector of ['.reference-description p:first-child', '.description p:first-child', '.doc-content > p:first-child']) {
        const value = text(document.querySelector(selector));
        if (value.length > 50) return value;
    }
    return null;
}

/**
 * `table.parameters` has one row per parameter (position, name, type,
 * optional) followed by an optional `continuation` row with its description.
 */
function extractParameters(document: Document): ParameterRecord[] {
    const table = document.querySelector('table.parameters');
    if (!table) return [];

    const parameters: ParameterRecord[] = [];
    let current: ParameterRecord | null = null;

    for (const row of Array.from(table.querySelectorAll('tbody tr'))) {
        const cells = Array.from(row.querySelectorAll('td'));

        if (row.classList.contains('continuation')) {
            if (current) {
                current.description = text(cells[cells.length - 1] ?? null);
                parameters.push(current);
                current = null;
            }
            continue;
        }

        if (cells.length < 4) continue;
        if (current) parameters.push(current);

        const optionalText = text(cells[3]);
        const defaultMatch = optionalText.match(/default:\s*(\S+)/i);
        current = {
            position: Number.parseInt(text(cells[0]), 10) || parameters.length + 1,
            name: text(cells[1].querySelector('code')) || text(cells[1]),
            type: text(cells[2].querySelector('code')) || text(cells[2]),
            optional: optionalText.includes('Yes'),
            default: defaultMatch ? defaultMatch[1] : null,
            description: '',
        };
    }

    if (current) parameters.push(current);
    return parameters;
}

function extractReturnType(document: Document): TypeRecord | null {
    for (const heading of Array.from(document.querySelectorAll('h2, h3, h4, strong'))) {
        if (!/^Returns?:?$/i.test(text(heading))) continue;

        const description = text(heading.nextElementSibling);
        const match = description.match(/^([A-Za-z0-9_.]+)/);
        if (match) return { type: match[1], description };
    }
    return null;
}

const VALUE_TYPE_PATTERN = /^(string|boolean|integer|number|object|function|array)$/i;

function extractValueTypes(document: Document): TypeRecord[] {
    const types: TypeRecord[] = [];
    for (const heading of Array.from(document.querySelectorAll('h2, h3'))) {
        const name = text(heading);
        if (!VALUE_TYPE_PATTERN.test(name)) continue;
        types.push({
            type: name.toLowerCase(),
            description: text(nextSibling(heading, el => el.tagName === 'P')),
        });
    }
    return types;
}

function extractReferenceExamples(document: Document): CodeExampleRecord[] {
    const examples: CodeExampleRecord[] = [];
    for (const block of Array.from(document.querySelectorAll('.reference_example'))) {
        const codeEl = block.querySelector('pre code');
        const code = text(codeEl);
        if (!codeEl || !code) continue;
        examples.push({
            title: text(block.querySelector('.title p')) || null,
            code,
            language: detectLanguage(codeEl.className) ?? 'javascript',
        });
    }
    return examples;
}

/**
 * `.reference_related` blocks start with the category name as a bare text node,
 * followed by a list of linked item names.
 */
function extractRelatedItems(document: Document): RelatedRecord {
    const related: RelatedRecord = { API: [], Options: [], Events: [] };

    for (const block of Array.from(document.querySelectorAll('.reference_related'))) {
        let label = '';
        for (const node of Array.from(block.childNodes)) {
            if (node.nodeName === 'UL') break;
            label += node.textContent ?? '';
        }
        const category = RELATED_CATEGORIES.find(c => c === label.trim());
        if (!category) continue;

        const items = Array.from(block.querySelectorAll('ul li a code'))
            .map(el => text(el))
            .filter(Boolean);
        if (items.length > 0) related[category] = items;
    }
    return related;
}

const NOTE_PATTERN = /\b(note|warning|important|caution|deprecated)\b/i;

function extractNotes(document: Document): string[] {
    const notes = new Set<string>();
    for (const el of Array.from(document.querySelectorAll('strong, b, .warning, .note, .important'))) {
        const value = text(el);
        if (NOTE_PATTERN.test(value)) notes.add(value);
    }
    return [...notes];
}

// ── DOM helpers ────────────────────────────────────────────────────────────────

function text(el: Element | null | undefined): string {
    return (el?.textContent ?? '').replace(/\s+/g, ' ').trim();
}

function nextSibling(el: Element, predicate: (candidate: Element) => boolean): Element | null {
    for (let sibling = el.nextElementSibling; sibling; sibling = sibling.nextElementSibling) {
        if (predicate(sibling)) return sibling;
    }
    return null;
}
