/**
 * Plain-text rendering of search results for `tools/call` responses.
 */

import type { RelatedCategory } from './db.js';
import { RELATED_CATEGORIES } from './db.js';
import type { DocumentDetails, DocumentHit, ExampleHit } from './search.js';

const EXCERPT_LENGTH = 300;

/**
 * Shortens content to roughly maxLength characters, preferring to cut at a
 * sentence end in the last 30% of the window, else at a word boundary.
 */
export function createExcerpt(content: string, maxLength: number = EXCERPT_LENGTH): string {
    const text = content.trim();
    if (text.length <= maxLength) return text;

    const window = text.slice(0, maxLength);
    const lastPeriod = window.lastIndexOf('.');
    const lastSpace = window.lastIndexOf(' ');

    if (lastPeriod > maxLength * 0.7) {
        return text.slice(0, lastPeriod + 1);
    }
    if (lastSpace !== -1) {
        return `${text.slice(0, lastSpace)}...`;
    }
    return `${window}...`;
}

export function formatSearchResults(results: DocumentHit[], query: string): string {
    if (results.length === 0) {
        return `No results found for query: "${query}"`;
    }

    let output = `Found ${results.length} results for "${query}":\n\n`;
    results.forEach((result, i) => {
        output += `[${i + 1}] ${result.title}\n`;
        output += `URL: ${result.url}\n`;
        output += `Type: ${result.doc_type}`;
        if (result.section) {
            output += ` | Section: ${result.section}`;
        }
        output += '\n';
        output += `Content: ${createExcerpt(result.content)}\n\n`;
        output += '---\n\n';
    });
    return output;
}

export function formatExamples(examples: ExampleHit[], query: string): string {
    if (examples.length === 0) {
        return `No code examples found for query: "${query}"`;
    }

    let output = `Found ${examples.length} code examples for "${query}":\n\n`;
    examples.forEach((example, i) => {
        output += `[${i + 1}] ${example.title ?? example.doc_title}\n`;
        output += `From: ${example.doc_title} (${example.url})\n`;
        output += `\`\`\`${example.language}\n${example.code}\n\`\`\`\n\n`;
    });
    return output;
}

export function formatFunctionDetails(doc: DocumentDetails): string {
    const lines: string[] = [`# ${doc.title}`, '', `URL: ${doc.url}`];
    lines.push(`Type: ${doc.doc_type}${doc.section ? ` | Section: ${doc.section}` : ''}`);
    if (doc.since_version) lines.push(`Since: DataTables ${doc.since_version}`);
    if (doc.signature) lines.push('', '## Signature', '', doc.signature);

    lines.push('', '## Description', '', doc.summary || createExcerpt(doc.content, 600));

    if (doc.parameters.length > 0) {
        lines.push('', '## Parameters', '');
        for (const p of doc.parameters) {
            const flags = p.optional
                ? `optional${p.default !== null ? `, default: ${p.default}` : ''}`
                : 'required';
            lines.push(`${p.position}. ${p.name} (${p.type}, ${flags})${p.description ? ` - ${p.description}` : ''}`);
        }
    }

    if (doc.returns) {
        lines.push('', '## Returns', '', `${doc.returns.type}${doc.returns.description ? ` - ${doc.returns.description}` : ''}`);
    }

    if (doc.value_types.length > 0) {
        lines.push('', '## Accepted types', '');
        for (const v of doc.value_types) {
            lines.push(`- ${v.type}${v.description ? `: ${v.description}` : ''}`);
        }
    }

    if (doc.examples.length > 0) {
        lines.push('', '## Examples');
        for (const e of doc.examples) {
            lines.push('');
            if (e.title) lines.push(e.title);
            lines.push(`\`\`\`${e.language}`, e.code, '```');
        }
    }

    const related = formatRelatedSections(doc);
    if (related.length > 0) {
        lines.push('', '## Related', '', ...related);
    }

    if (doc.notes.length > 0) {
        lines.push('', '## Notes', '');
        for (const note of doc.notes) lines.push(`- ${note}`);
    }

    return lines.join('\n');
}

export function formatRelatedItems(doc: DocumentDetails, category?: RelatedCategory): string {
    const sections = formatRelatedSections(doc, category);
    if (sections.length === 0) {
        const scope = category ? ` in category ${category}` : '';
        return `No related items found for ${doc.title}${scope}`;
    }
    return [`Related items for ${doc.title}:`, '', ...sections].join('\n');
}

function formatRelatedSections(doc: DocumentDetails, only?: RelatedCategory): string[] {
    const lines: string[] = [];
    for (const category of RELATED_CATEGORIES) {
        if (only && category !== only) continue;
        const items = doc.related[category];
        if (items.length === 0) continue;
        lines.push(`${category}: ${items.join(', ')}`);
    }
    return lines;
}
