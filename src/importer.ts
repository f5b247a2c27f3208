import { z } from 'zod';
import { DOC_TYPES } from './db.js';
import type { DocsStore, DocumentRecord } from './db.js';
import { describeZodError, fail, ok } from './protocol.js';
import type { Outcome } from './protocol.js';

const ParameterSchema = z.object({
    position: z.number().int().min(1),
    name: z.string().min(1),
    type: z.string(),
    optional: z.boolean().default(false),
    default: z.string().nullable().default(null),
    description: z.string().default(''),
});

const TypeSchema = z.object({
    type: z.string().min(1),
    description: z.string().default(''),
});

const CodeExampleSchema = z.object({
    title: z.string().nullable().default(null),
    code: z.string().min(1),
    language: z.string().default('javascript'),
});

const RelatedSchema = z.object({
    API: z.array(z.string()).optional(),
    Options: z.array(z.string()).optional(),
    Events: z.array(z.string()).optional(),
});

export const DocumentRecordSchema = z.object({
    title: z.string().min(1),
    url: z.string().url(),
    content: z.string(),
    section: z.string().nullable().default(null),
    doc_type: z.enum(DOC_TYPES),
    signature: z.string().nullable().optional(),
    since_version: z.string().nullable().optional(),
    summary: z.string().nullable().optional(),
    parameters: z.array(ParameterSchema).optional(),
    returns: TypeSchema.nullable().optional(),
    value_types: z.array(TypeSchema).optional(),
    examples: z.array(CodeExampleSchema).optional(),
    related: RelatedSchema.optional(),
    notes: z.array(z.string()).optional(),
});

/**
 * Validates every record, then saves them all. A single invalid record rejects
 * the whole batch before anything is written. Returns the number of records saved.
 */
export function importDocuments(store: DocsStore, records: unknown): Outcome<number> {
    if (!Array.isArray(records)) {
        return fail('Import file must contain a JSON array of documents');
    }

    const valid: DocumentRecord[] = [];
    for (const [i, raw] of records.entries()) {
        const parsed = DocumentRecordSchema.safeParse(raw);
        if (!parsed.success) {
            return fail(`Record ${i}: ${describeZodError(parsed.error)}`);
        }
        valid.push(parsed.data);
    }

    for (const record of valid) {
        store.saveDocument(record);
    }
    return ok(valid.length);
}
