#!/usr/bin/env node

import fs from 'fs';
import { HELP_TEXT, parseCommand } from './cli.js';
import type { Command } from './cli.js';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { DocsStore, openDatabase } from './db.js';
import { importDocuments } from './importer.js';
import { DocumentationIndexer } from './indexer.js';
import { createLogger, errorMessage } from './log.js';
import { openSearchEngine } from './search.js';
import type { DocsSearch } from './search.js';
import { McpSession } from './session.js';
import { serveStdio } from './transport.js';

// CRITICAL: MCP over stdio requires stdout to be strictly JSON-RPC messages.
// Redirect all console.log output to stderr to prevent protocol corruption.
console.log = (...args: unknown[]) => {
    console.error(...args);
};

const log = createLogger('cli');

// ── Commands ───────────────────────────────────────────────────────────────────

async function serve(config: Config): Promise<void> {
    const serverLog = createLogger('server');

    // Opened on the first tool call; initialize must work before an index exists.
    let engine: DocsSearch | null = null;
    const search = (): DocsSearch => {
        if (!engine) engine = openSearchEngine(config.dbPath);
        return engine;
    };

    const session = new McpSession({ search, logger: createLogger('session') });
    serverLog(`DataTables docs MCP server running on stdio (db: ${config.dbPath})`);
    await serveStdio(session, process.stdin, process.stdout, serverLog);
}

async function index(config: Config, command: Extract<Command, { name: 'index' }>): Promise<void> {
    const store = new DocsStore(openDatabase(config.dbPath));
    const indexer = new DocumentationIndexer(store, {
        baseUrl: config.baseUrl,
        concurrency: config.concurrency,
        force: command.force,
        sources: command.sources,
    });

    log(`Indexing ${command.sources.join(', ')} from ${config.baseUrl} into ${config.dbPath}`);
    const report = await indexer.indexAll();
    log(`Discovered ${report.discovered}, indexed ${report.indexed}, skipped ${report.skipped}, failed ${report.failed}`);
}

function importFile(config: Config, file: string): void {
    const records: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    const store = new DocsStore(openDatabase(config.dbPath));

    const outcome = importDocuments(store, records);
    if (!outcome.ok) {
        throw new Error(`Import failed: ${outcome.message}`);
    }
    log(`Imported ${outcome.value} documents into ${config.dbPath}`);
}

function stats(config: Config): void {
    const result = openSearchEngine(config.dbPath).stats();
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
}

// ── Entry ──────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const parsed = parseCommand(process.argv.slice(2));
    if (!parsed.ok) {
        throw new Error(`${parsed.message}\n\n${HELP_TEXT}`);
    }

    const command = parsed.value;
    if (command.name === 'help') {
        process.stderr.write(`${HELP_TEXT}\n`);
        return;
    }

    const config = loadConfig();
    switch (command.name) {
        case 'serve':
            return serve(config);
        case 'index':
            return index(config, command);
        case 'import':
            return importFile(config, command.file);
        case 'stats':
            return stats(config);
    }
}

main().catch((error: unknown) => {
    log(`Fatal: ${errorMessage(error)}`);
    process.exit(1);
});
