/**
 * Test: Command-line parsing
 */

import assert from 'node:assert/strict';
import { parseCommand } from '../src/cli.js';

console.log('Running CLI tests...\n');

// ── Test 1: Commands ─────────────────────────────────────────────────────────
{
    assert.deepEqual(parseCommand([]), { ok: true, value: { name: 'serve' } });
    assert.deepEqual(parseCommand(['serve']), { ok: true, value: { name: 'serve' } });
    assert.deepEqual(parseCommand(['stats']), { ok: true, value: { name: 'stats' } });
    assert.deepEqual(parseCommand(['--help']), { ok: true, value: { name: 'help' } });
    assert.deepEqual(parseCommand(['import', 'docs.json']), { ok: true, value: { name: 'import', file: 'docs.json' } });
    console.log('✓ Test 1 passed: serve is the default command');
}

// ── Test 2: index options ────────────────────────────────────────────────────
{
    assert.deepEqual(parseCommand(['index']),
        { ok: true, value: { name: 'index', force: false, sources: ['reference', 'examples'] } });
    assert.deepEqual(parseCommand(['index', '--only', 'examples', '--force']),
        { ok: true, value: { name: 'index', force: true, sources: ['examples'] } });
    console.log('✓ Test 2 passed: --force and --only');
}

// ── Test 3: Usage errors ─────────────────────────────────────────────────────
{
    assert.deepEqual(parseCommand(['crawl']), { ok: false, message: 'Unknown command: crawl' });
    assert.deepEqual(parseCommand(['import']), { ok: false, message: 'import requires a JSON file path' });
    assert.deepEqual(parseCommand(['import', 'a.json', 'b.json']), { ok: false, message: 'Unexpected argument: b.json' });
    assert.deepEqual(parseCommand(['stats', '--json']), { ok: false, message: 'Unexpected argument: --json' });
    assert.deepEqual(parseCommand(['index', '--only', 'manual']),
        { ok: false, message: '--only must be one of: reference, examples' });
    assert.deepEqual(parseCommand(['index', '--only']),
        { ok: false, message: '--only must be one of: reference, examples' });
    assert.deepEqual(parseCommand(['index', '--fast']), { ok: false, message: 'Unknown option: --fast' });
    console.log('✓ Test 3 passed: unknown commands and options rejected');
}

console.log('\nAll CLI tests passed.');
