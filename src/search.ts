/**
 * Full-text search over the documentation database using SQLite FTS5.
 *
 * Queries reaching this module are already sanitised (see sanitize.ts), so the
 * FTS5 grammar is used as-is: implicit AND between terms, `"exact phrase"`,
 * `prefix*`, and AND / OR / NOT. Syntax errors raised by SQLite propagate to
 * the caller.
 */

import fs from 'fs';
import { openDatabase } from './db.js';
import type {
    CodeExampleRecord,
    Db,
    DocType,
    ExampleLanguage,
    ParameterRecord,
    RelatedCategory,
    RelatedRecord,
    TypeRecord,
} from './db.js';

// ── Result types ───────────────────────────────────────────────────────────────

export interface DocumentHit {
    title: string;
    url: string;
    content: string;
    section: string | null;
    doc_type: DocType;
    rank: number;
}

export interface ExampleHit {
    doc_title: string;
    url: string;
    title: string | null;
    code: string;
    language: string;
}

export interface DocumentDetails {
    title: string;
    url: string;
    section: string | null;
    doc_type: DocType;
    signature: string | null;
    since_version: string | null;
    summary: string | null;
    content: string;
    parameters: ParameterRecord[];
    returns: TypeRecord | null;
    value_types: TypeRecord[];
    examples: CodeExampleRecord[];
    related: RelatedRecord;
    notes: string[];
}

export interface IndexStats {
    total_docs: number;
    by_type: Record<string, number>;
}

export interface SearchOptions {
    limit: number;
    docType?: DocType;
    /** Case-insensitive substring match against the section name. */
    section?: string;
}

export interface ExampleSearchOptions {
    limit: number;
    language?: ExampleLanguage;
}

/**
 * What the tools need from the search backend. `match` arguments are FTS5
 * query strings.
 */
export interface DocsSearch {
    search(match: string, options: SearchOptions): DocumentHit[];
    searchExamples(match: string, options: ExampleSearchOptions): ExampleHit[];
    /** Resolves a function / option / event name to its document, or null. */
    findDocument(name: string): DocumentDetails | null;
    stats(): IndexStats;
}

// ── SQLite implementation ──────────────────────────────────────────────────────

interface DocumentRow {
    id: number;
    title: string;
    url: string;
    content: string;
    section: string | null;
    doc_type: DocType;
    signature: string | null;
    since_version: string | null;
    summary: string | null;
}

interface ParameterRow {
    position: number;
    name: string;
    type: string;
    optional: number;
    default_value: string | null;
    description: string | null;
}

export class SearchEngine implements DocsSearch {
    constructor(private readonly db: Db) { }

    search(match: string, options: SearchOptions): DocumentHit[] {
        const where = ['documentation_fts MATCH ?'];
        const params: Array<string | number> = [match];

        if (options.docType) {
            where.push('d.doc_type = ?');
            params.push(options.docType);
        }
        if (options.section) {
            where.push(`d.section LIKE '%' || ? || '%'`);
            params.push(options.section);
        }
        params.push(options.limit);

        return this.db.prepare(`
            SELECT
                d.title,
                d.url,
                d.content,
                d.section,
                d.doc_type,
                documentation_fts.rank AS rank
            FROM documentation_fts
            JOIN documentation d ON d.id = documentation_fts.rowid
            WHERE ${where.join(' AND ')}
            ORDER BY documentation_fts.rank
            LIMIT ?
        `).all(...params) as DocumentHit[];
    }

    searchExamples(match: string, options: ExampleSearchOptions): ExampleHit[] {
        const params: Array<string | number> = [match];
        let languageFilter = '';
        if (options.language) {
            languageFilter = 'AND e.language = ?';
            params.push(options.language);
        }
        params.push(options.limit);

        return this.db.prepare(`
            SELECT
                d.title AS doc_title,
                d.url,
                e.title,
                e.code,
                e.language
            FROM documentation_fts
            JOIN documentation d ON d.id = documentation_fts.rowid
            JOIN code_examples e ON e.doc_id = d.id
            WHERE documentation_fts MATCH ?
              ${languageFilter}
            ORDER BY documentation_fts.rank, e.id
            LIMIT ?
        `).all(...params) as ExampleHit[];
    }

    findDocument(name: string): DocumentDetails | null {
        const bare = name.trim().replace(/\(\)$/, '');
        if (!bare) return null;

        // Reference pages win over manual/example pages with the same title
        const row = this.db.prepare(`
            SELECT id, title, url, content, section, doc_type, signature, since_version, summary
            FROM documentation
            WHERE title = ? COLLATE NOCASE
               OR title = ? COLLATE NOCASE
            ORDER BY CASE doc_type WHEN 'reference' THEN 0 ELSE 1 END, id
            LIMIT 1
        `).get(bare, `${bare}()`) as DocumentRow | undefined;

        return row ? this.loadDetails(row) : null;
    }

    stats(): IndexStats {
        const rows = this.db.prepare(`
            SELECT doc_type, COUNT(*) AS count
            FROM documentation
            GROUP BY doc_type
        `).all() as Array<{ doc_type: string; count: number }>;

        const byType: Record<string, number> = {};
        let total = 0;
        for (const row of rows) {
            byType[row.doc_type] = row.count;
            total += row.count;
        }
        return { total_docs: total, by_type: byType };
    }

    private loadDetails(row: DocumentRow): DocumentDetails {
        const parameters = (this.db.prepare(`
            SELECT position, name, type, optional, default_value, description
            FROM parameters WHERE doc_id = ? ORDER BY position, id
        `).all(row.id) as ParameterRow[]).map(p => ({
            position: p.position,
            name: p.name,
            type: p.type,
            optional: p.optional === 1,
            default: p.default_value,
            description: p.description ?? '',
        }));

        const returns = this.db.prepare(`
            SELECT type, COALESCE(description, '') AS description
            FROM return_types WHERE doc_id = ? ORDER BY id LIMIT 1
        `).get(row.id) as TypeRecord | undefined;

        const valueTypes = this.db.prepare(`
            SELECT type, COALESCE(description, '') AS description
            FROM value_types WHERE doc_id = ? ORDER BY id
        `).all(row.id) as TypeRecord[];

        const examples = this.db.prepare(`
            SELECT title, code, COALESCE(language, 'javascript') AS language
            FROM code_examples WHERE doc_id = ? ORDER BY id
        `).all(row.id) as CodeExampleRecord[];

        const related: RelatedRecord = { API: [], Options: [], Events: [] };
        const relatedRows = this.db.prepare(`
            SELECT related_doc_title, category
            FROM related_items WHERE doc_id = ? ORDER BY id
        `).all(row.id) as Array<{ related_doc_title: string; category: RelatedCategory }>;
        for (const r of relatedRows) {
            related[r.category]?.push(r.related_doc_title);
        }

        const notes = (this.db.prepare(`
            SELECT note_text FROM notes_caveats WHERE doc_id = ? ORDER BY id
        `).all(row.id) as Array<{ note_text: string }>).map(n => n.note_text);

        return {
            title: row.title,
            url: row.url,
            section: row.section,
            doc_type: row.doc_type,
            signature: row.signature,
            since_version: row.since_version,
            summary: row.summary,
            content: row.content,
            parameters,
            returns: returns ?? null,
            value_types: valueTypes,
            examples,
            related,
            notes,
        };
    }
}

/**
 * Opens an existing index for searching. Fails if the database has not been
 * built yet.
 */
export function openSearchEngine(dbPath: string): SearchEngine {
    if (!fs.existsSync(dbPath)) {
        throw new Error(`Database not found at ${dbPath}. Run 'datatables-docs-mcp index' first.`);
    }
    return new SearchEngine(openDatabase(dbPath));
}
