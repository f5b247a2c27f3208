import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export type Db = Database.Database;

export const DOC_TYPES = ['manual', 'example', 'reference', 'extension'] as const;
export type DocType = (typeof DOC_TYPES)[number];

export const RELATED_CATEGORIES = ['API', 'Options', 'Events'] as const;
export type RelatedCategory = (typeof RELATED_CATEGORIES)[number];

export const EXAMPLE_LANGUAGES = ['javascript', 'html', 'css'] as const;
export type ExampleLanguage = (typeof EXAMPLE_LANGUAGES)[number];

// ── Schema ─────────────────────────────────────────────────────────────────────

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS documentation (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        title         TEXT NOT NULL,
        url           TEXT UNIQUE NOT NULL,
        content       TEXT NOT NULL,
        section       TEXT,
        doc_type      TEXT NOT NULL,
        signature     TEXT,
        since_version TEXT,
        summary       TEXT,
        indexed_at    DATETIME DEFAULT CURRENT_TIMESTAMP
    );

    CREATE INDEX IF NOT EXISTS idx_documentation_title ON documentation (title COLLATE NOCASE);

    -- FTS5 external-content index over the searchable columns
    CREATE VIRTUAL TABLE IF NOT EXISTS documentation_fts USING fts5(
        title,
        url,
        content,
        section,
        doc_type,
        content='documentation',
        content_rowid='id'
    );

    CREATE TRIGGER IF NOT EXISTS documentation_ai AFTER INSERT ON documentation BEGIN
        INSERT INTO documentation_fts (rowid, title, url, content, section, doc_type)
        VALUES (new.id, new.title, new.url, new.content, new.section, new.doc_type);
    END;

    CREATE TRIGGER IF NOT EXISTS documentation_ad AFTER DELETE ON documentation BEGIN
        INSERT INTO documentation_fts (documentation_fts, rowid, title, url, content, section, doc_type)
        VALUES ('delete', old.id, old.title, old.url, old.content, old.section, old.doc_type);
    END;

    CREATE TRIGGER IF NOT EXISTS documentation_au AFTER UPDATE ON documentation BEGIN
        INSERT INTO documentation_fts (documentation_fts, rowid, title, url, content, section, doc_type)
        VALUES ('delete', old.id, old.title, old.url, old.content, old.section, old.doc_type);
        INSERT INTO documentation_fts (rowid, title, url, content, section, doc_type)
        VALUES (new.id, new.title, new.url, new.content, new.section, new.doc_type);
    END;

    CREATE TABLE IF NOT EXISTS parameters (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        doc_id        INTEGER NOT NULL,
        position      INTEGER NOT NULL,
        name          TEXT NOT NULL,
        type          TEXT NOT NULL,
        optional      INTEGER DEFAULT 0,
        default_value TEXT,
        description   TEXT,
        FOREIGN KEY (doc_id) REFERENCES documentation (id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_parameters_doc_id ON parameters (doc_id);

    CREATE TABLE IF NOT EXISTS return_types (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        doc_id      INTEGER NOT NULL,
        type        TEXT NOT NULL,
        description TEXT,
        FOREIGN KEY (doc_id) REFERENCES documentation (id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_return_types_doc_id ON return_types (doc_id);

    CREATE TABLE IF NOT EXISTS value_types (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        doc_id      INTEGER NOT NULL,
        type        TEXT NOT NULL,
        description TEXT,
        FOREIGN KEY (doc_id) REFERENCES documentation (id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_value_types_doc_id ON value_types (doc_id);

    CREATE TABLE IF NOT EXISTS code_examples (
        id       INTEGER PRIMARY KEY AUTOINCREMENT,
        doc_id   INTEGER NOT NULL,
        title    TEXT,
        code     TEXT NOT NULL,
        language TEXT DEFAULT 'javascript',
        FOREIGN KEY (doc_id) REFERENCES documentation (id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_examples_doc_id ON code_examples (doc_id);

    CREATE TABLE IF NOT EXISTS related_items (
        id                INTEGER PRIMARY KEY AUTOINCREMENT,
        doc_id            INTEGER NOT NULL,
        related_doc_title TEXT NOT NULL,
        category          TEXT NOT NULL,
        FOREIGN KEY (doc_id) REFERENCES documentation (id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_related_doc_id ON related_items (doc_id);

    CREATE TABLE IF NOT EXISTS notes_caveats (
        id        INTEGER PRIMARY KEY AUTOINCREMENT,
        doc_id    INTEGER NOT NULL,
        note_text TEXT NOT NULL,
        FOREIGN KEY (doc_id) REFERENCES documentation (id) ON DELETE CASCADE
    );
    CREATE INDEX IF NOT EXISTS idx_notes_doc_id ON notes_caveats (doc_id);
`;

/**
 * Opens (creating if needed) the documentation database and ensures the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): Db {
    if (dbPath !== ':memory:') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA);
    return db;
}

// ── Records ────────────────────────────────────────────────────────────────────

export interface ParameterRecord {
    position: number;
    name: string;
    type: string;
    optional: boolean;
    default: string | null;
    description: string;
}

export interface TypeRecord {
    type: string;
    description: string;
}

export interface CodeExampleRecord {
    title: string | null;
    code: string;
    language: string;
}

export type RelatedRecord = Record<RelatedCategory, string[]>;

/** One scraped page plus everything extracted from it. */
export interface DocumentRecord {
    title: string;
    url: string;
    content: string;
    section: string | null;
    doc_type: DocType;
    signature?: string | null;
    since_version?: string | null;
    summary?: string | null;
    parameters?: ParameterRecord[];
    returns?: TypeRecord | null;
    value_types?: TypeRecord[];
    examples?: CodeExampleRecord[];
    related?: Partial<RelatedRecord>;
    notes?: string[];
}

// ── Store ──────────────────────────────────────────────────────────────────────

/**
 * Write side of the documentation database, used by the indexer and importer.
 */
export class DocsStore {
    constructor(private readonly db: Db) { }

    /**
     * Inserts or updates a document by URL and replaces all of its structured
     * rows. Returns the document id.
     */
    saveDocument(record: DocumentRecord): number {
        return this.db.transaction((doc: DocumentRecord): number => {
            const row = this.db.prepare(`
                INSERT INTO documentation (title, url, content, section, doc_type, signature, since_version, summary, indexed_at)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
                ON CONFLICT(url) DO UPDATE SET
                    title         = excluded.title,
                    content       = excluded.content,
                    section       = excluded.section,
                    doc_type      = excluded.doc_type,
                    signature     = excluded.signature,
                    since_version = excluded.since_version,
                    summary       = excluded.summary,
                    indexed_at    = CURRENT_TIMESTAMP
                RETURNING id
            `).get(
                doc.title,
                doc.url,
                doc.content,
                doc.section,
                doc.doc_type,
                doc.signature ?? null,
                doc.since_version ?? null,
                doc.summary ?? null,
            ) as { id: number };

            this.replaceStructured(row.id, doc);
            return row.id;
        })(record);
    }

    isIndexed(url: string): boolean {
        return this.db.prepare(`SELECT 1 FROM documentation WHERE url = ?`).get(url) !== undefined;
    }

    private replaceStructured(docId: number, doc: DocumentRecord): void {
        for (const table of ['parameters', 'return_types', 'value_types', 'code_examples', 'related_items', 'notes_caveats']) {
            this.db.prepare(`DELETE FROM ${table} WHERE doc_id = ?`).run(docId);
        }

        const insertParam = this.db.prepare(`
            INSERT INTO parameters (doc_id, position, name, type, optional, default_value, description)
            VALUES (?, ?, ?, ?, ?, ?, ?)
        `);
        for (const p of doc.parameters ?? []) {
            insertParam.run(docId, p.position, p.name, p.type, p.optional ? 1 : 0, p.default, p.description);
        }

        if (doc.returns) {
            this.db.prepare(`INSERT INTO return_types (doc_id, type, description) VALUES (?, ?, ?)`)
                .run(docId, doc.returns.type, doc.returns.description);
        }

        const insertValueType = this.db.prepare(`INSERT INTO value_types (doc_id, type, description) VALUES (?, ?, ?)`);
        for (const v of doc.value_types ?? []) {
            insertValueType.run(docId, v.type, v.description);
        }

        const insertExample = this.db.prepare(`INSERT INTO code_examples (doc_id, title, code, language) VALUES (?, ?, ?, ?)`);
        for (const e of doc.examples ?? []) {
            insertExample.run(docId, e.title, e.code, e.language);
        }

        const insertRelated = this.db.prepare(`INSERT INTO related_items (doc_id, related_doc_title, category) VALUES (?, ?, ?)`);
        for (const category of RELATED_CATEGORIES) {
            for (const title of doc.related?.[category] ?? []) {
                insertRelated.run(docId, title, category);
            }
        }

        const insertNote = this.db.prepare(`INSERT INTO notes_caveats (doc_id, note_text) VALUES (?, ?)`);
        for (const note of doc.notes ?? []) {
            insertNote.run(docId, note);
        }
    }
}
