import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { DOC_TYPES, EXAMPLE_LANGUAGES, RELATED_CATEGORIES } from './db.js';
import { describeZodError, fail, ok } from './protocol.js';
import type { Outcome } from './protocol.js';
import { sanitizeQuery } from './sanitize.js';
import type { DocsSearch } from './search.js';
import {
    formatExamples,
    formatFunctionDetails,
    formatRelatedItems,
    formatSearchResults,
} from './format.js';

export interface ToolContext {
    /** Called once per tool call; may throw if the index is unavailable. */
    search: () => DocsSearch;
}

interface ToolDefinition<S extends z.ZodTypeAny> {
    descriptor: Tool;
    args: S;
    run(args: z.infer<S>, ctx: ToolContext): Outcome<string>;
}

export interface RegisteredTool {
    descriptor: Tool;
    call(rawArgs: Record<string, unknown>, ctx: ToolContext): Outcome<string>;
}

function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): RegisteredTool {
    return {
        descriptor: definition.descriptor,
        call(rawArgs, ctx) {
            const parsed = definition.args.safeParse(rawArgs);
            if (!parsed.success) return fail(describeZodError(parsed.error));
            return definition.run(parsed.data, ctx);
        },
    };
}

// ── Argument schemas ───────────────────────────────────────────────────────────

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 100;
const LIMIT_MESSAGE = `limit must be an integer between 1 and ${MAX_LIMIT}`;

function requiredString(name: string) {
    const message = `${name} parameter is required`;
    return z
        .string({ required_error: message, invalid_type_error: message })
        .refine(value => value.trim().length > 0, { message });
}

// Clients send an explicit null for optional arguments they leave unset
function absentIfNull<S extends z.ZodTypeAny>(schema: S) {
    return schema.nullish().transform(value => value ?? undefined);
}

function optionalString(name: string) {
    return absentIfNull(z.string({ invalid_type_error: `${name} must be a string` }));
}

function oneOf<T extends readonly [string, ...string[]]>(name: string, values: T) {
    const message = `${name} must be one of: ${values.join(', ')}`;
    return absentIfNull(z.enum(values, { errorMap: () => ({ message }) }));
}

// Clients sometimes send numbers as strings, so coerce before validating
const limitArg = z.coerce
    .number({ invalid_type_error: LIMIT_MESSAGE })
    .int(LIMIT_MESSAGE)
    .min(1, LIMIT_MESSAGE)
    .max(MAX_LIMIT, LIMIT_MESSAGE)
    .nullish()
    .transform(value => value ?? DEFAULT_LIMIT);

const limitProperty = {
    type: 'integer',
    description: `Maximum number of results to return (default: ${DEFAULT_LIMIT})`,
    default: DEFAULT_LIMIT,
    minimum: 1,
    maximum: MAX_LIMIT,
};

// ── Tools ──────────────────────────────────────────────────────────────────────

const searchDatatables = defineTool({
    descriptor: {
        name: 'search_datatables',
        description: [
            'Search DataTables.net documentation and examples.',
            'Returns relevant documentation sections with titles, URLs, and content excerpts.',
            'Hyphenated terms such as "server-side" are matched as phrases;',
            'quoted phrases and AND / OR / NOT are passed to the full-text engine unchanged.',
        ].join(' '),
        inputSchema: {
            type: 'object',
            properties: {
                query: {
                    type: 'string',
                    description: 'Search query (e.g., "ajax options", "server-side processing", "column rendering")',
                },
                limit: limitProperty,
            },
            required: ['query'],
        },
    },
    args: z.object({ query: requiredString('query'), limit: limitArg }),
    run({ query, limit }, ctx) {
        const results = ctx.search().search(sanitizeQuery(query), { limit });
        return ok(formatSearchResults(results, query));
    },
});

const getFunctionDetails = defineTool({
    descriptor: {
        name: 'get_function_details',
        description: [
            'Get structured details for a DataTables API method, option or event:',
            'signature, parameters, return type, accepted value types, code examples,',
            'related items and notes. Accepts names with or without trailing "()".',
        ].join(' '),
        inputSchema: {
            type: 'object',
            properties: {
                name: {
                    type: 'string',
                    description: 'Name of the API method, option or event (e.g., "ajax.reload()", "pageLength", "draw")',
                },
            },
            required: ['name'],
        },
    },
    args: z.object({ name: requiredString('name') }),
    run({ name }, ctx) {
        const doc = ctx.search().findDocument(name);
        if (!doc) return ok(`No documentation found for: ${name}`);
        return ok(formatFunctionDetails(doc));
    },
});

const searchByExample = defineTool({
    descriptor: {
        name: 'search_by_example',
        description: 'Find code examples from pages matching the query, optionally restricted to one language.',
        inputSchema: {
            type: 'object',
            properties: {
                query: {
                    type: 'string',
                    description: 'What the example should demonstrate (e.g., "row grouping", "ajax reload")',
                },
                language: {
                    type: 'string',
                    enum: [...EXAMPLE_LANGUAGES],
                    description: 'Only return examples in this language',
                },
                limit: limitProperty,
            },
            required: ['query'],
        },
    },
    args: z.object({
        query: requiredString('query'),
        language: oneOf('language', EXAMPLE_LANGUAGES),
        limit: limitArg,
    }),
    run({ query, language, limit }, ctx) {
        const examples = ctx.search().searchExamples(sanitizeQuery(query), { limit, language });
        return ok(formatExamples(examples, query));
    },
});

const searchByTopic = defineTool({
    descriptor: {
        name: 'search_by_topic',
        description: 'Search the documentation within a section and/or document type (manual, example, reference, extension).',
        inputSchema: {
            type: 'object',
            properties: {
                query: { type: 'string', description: 'Search query' },
                section: {
                    type: 'string',
                    description: 'Section name to restrict to, matched as a case-insensitive substring (e.g., "Options", "Ajax")',
                },
                doc_type: {
                    type: 'string',
                    enum: [...DOC_TYPES],
                    description: 'Only return documents of this type',
                },
                limit: limitProperty,
            },
            required: ['query'],
        },
    },
    args: z.object({
        query: requiredString('query'),
        section: optionalString('section'),
        doc_type: oneOf('doc_type', DOC_TYPES),
        limit: limitArg,
    }),
    run({ query, section, doc_type, limit }, ctx) {
        const results = ctx.search().search(sanitizeQuery(query), {
            limit,
            docType: doc_type,
            section: section?.trim() || undefined,
        });
        return ok(formatSearchResults(results, query));
    },
});

const getRelatedItems = defineTool({
    descriptor: {
        name: 'get_related_items',
        description: 'List the API methods, options and events cross-referenced by a documentation page.',
        inputSchema: {
            type: 'object',
            properties: {
                name: {
                    type: 'string',
                    description: 'Name of the API method, option or event',
                },
                category: {
                    type: 'string',
                    enum: [...RELATED_CATEGORIES],
                    description: 'Only return related items of this category',
                },
            },
            required: ['name'],
        },
    },
    args: z.object({
        name: requiredString('name'),
        category: oneOf('category', RELATED_CATEGORIES),
    }),
    run({ name, category }, ctx) {
        const doc = ctx.search().findDocument(name);
        if (!doc) return ok(`No documentation found for: ${name}`);
        return ok(formatRelatedItems(doc, category));
    },
});

// ── Registry ───────────────────────────────────────────────────────────────────

const TOOLS: readonly RegisteredTool[] = Object.freeze([
    searchDatatables,
    getFunctionDetails,
    searchByExample,
    searchByTopic,
    getRelatedItems,
]);

const TOOLS_BY_NAME = new Map(TOOLS.map(tool => [tool.descriptor.name, tool]));

export function listTools(): Tool[] {
    return TOOLS.map(tool => tool.descriptor);
}

/**
 * Runs a tool by name. Argument problems and unknown names come back as
 * failures; errors from the search backend are thrown.
 */
export function callTool(name: string, args: Record<string, unknown>, ctx: ToolContext): Outcome<string> {
    const tool = TOOLS_BY_NAME.get(name);
    if (!tool) return fail(`Unknown tool: ${name}`);
    return tool.call(args, ctx);
}
