import { INDEX_SOURCES } from './indexer.js';
import type { IndexSource } from './indexer.js';
import { fail, ok } from './protocol.js';
import type { Outcome } from './protocol.js';

export type Command =
    | { name: 'serve' }
    | { name: 'index'; force: boolean; sources: IndexSource[] }
    | { name: 'import'; file: string }
    | { name: 'stats' }
    | { name: 'help' };

export const HELP_TEXT = `
Usage
  datatables-docs-mcp [command]

Commands
  serve                    Run the MCP server on stdio (default)
  index [options]          Scrape the DataTables site into the local index
  import <file.json>       Load pre-extracted documents from a JSON array
  stats                    Print document counts per type

Index options
  --force                  Re-index pages that are already stored
  --only <source>          Only index one source: reference | examples

Environment
  DATATABLES_MCP_DB            Database path (default ~/.datatables-docs-mcp/docs.db)
  DATATABLES_MCP_BASE_URL      Site to index (default https://datatables.net)
  DATATABLES_MCP_CONCURRENCY   Parallel page fetches, 1-8 (default 2)
`.trim();

function isIndexSource(value: string): value is IndexSource {
    return INDEX_SOURCES.some(source => source === value);
}

export function parseCommand(argv: string[]): Outcome<Command> {
    const [name = 'serve', ...rest] = argv;

    switch (name) {
        case 'serve':
            if (rest.length > 0) return fail(`Unexpected argument: ${rest[0]}`);
            return ok<Command>({ name: 'serve' });

        case 'stats':
            if (rest.length > 0) return fail(`Unexpected argument: ${rest[0]}`);
            return ok<Command>({ name: 'stats' });

        case 'help':
        case '--help':
        case '-h':
            return ok<Command>({ name: 'help' });

        case 'import': {
            const [file, extra] = rest;
            if (!file) return fail('import requires a JSON file path');
            if (extra !== undefined) return fail(`Unexpected argument: ${extra}`);
            return ok<Command>({ name: 'import', file });
        }

        case 'index': {
            let force = false;
            let sources: IndexSource[] = [...INDEX_SOURCES];

            for (let i = 0; i < rest.length; i++) {
                const arg = rest[i];
                switch (arg) {
                    case '--force':
                        force = true;
                        break;
                    case '--only': {
                        const value = rest[++i];
                        if (value === undefined || !isIndexSource(value)) {
                            return fail(`--only must be one of: ${INDEX_SOURCES.join(', ')}`);
                        }
                        sources = [value];
                        break;
                    }
                    default:
                        return fail(`Unknown option: ${arg}`);
                }
            }
            return ok<Command>({ name: 'index', force, sources });
        }

        default:
            return fail(`Unknown command: ${name}`);
    }
}
