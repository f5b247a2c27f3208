/**
 * Test: SearchEngine (FTS5 queries over an in-memory index)
 */

import assert from 'node:assert/strict';
import { DocsStore, openDatabase } from '../src/db.js';
import { SearchEngine, openSearchEngine } from '../src/search.js';
import { sanitizeQuery } from '../src/sanitize.js';

console.log('Running search tests...\n');

const db = openDatabase(':memory:');
const store = new DocsStore(db);
const engine = new SearchEngine(db);

store.saveDocument({
    title: 'ajax.reload()',
    url: 'https://datatables.net/reference/api/ajax.reload()',
    content: 'Reload the table data from the Ajax data source.',
    section: 'API',
    doc_type: 'reference',
    signature: 'ajax.reload( callback, resetPaging )',
    parameters: [
        { position: 2, name: 'resetPaging', type: 'boolean', optional: true, default: 'true', description: 'Reset paging' },
        { position: 1, name: 'callback', type: 'function', optional: true, default: 'null', description: 'Run after reload' },
    ],
    returns: { type: 'DataTables.Api', description: 'API instance' },
    examples: [{ title: 'Reload every 30 seconds', code: 'setInterval(() => table.ajax.reload(), 30000);', language: 'javascript' }],
    related: { API: ['ajax.url()'], Options: ['ajax'] },
    notes: ['Note: the reload is asynchronous'],
});
store.saveDocument({
    title: 'pageLength',
    url: 'https://datatables.net/reference/option/pageLength',
    content: 'Change the initial page length (number of rows per page).',
    section: 'Options',
    doc_type: 'reference',
});
store.saveDocument({
    title: 'Server-side processing',
    url: 'https://datatables.net/examples/server_side/simple.html',
    content: 'Server side processing sends paging requests to the server.',
    section: 'Server-side',
    doc_type: 'example',
    examples: [
        { title: null, code: "new DataTable('#example', { serverSide: true });", language: 'javascript' },
        { title: null, code: '<table id="example"></table>', language: 'html' },
    ],
});
store.saveDocument({
    title: 'Ajax',
    url: 'https://datatables.net/manual/ajax',
    content: 'Ajax data loading with the ajax option.',
    section: 'Manual',
    doc_type: 'manual',
});
store.saveDocument({
    title: 'ajax',
    url: 'https://datatables.net/reference/option/ajax',
    content: 'Load data for the table from an Ajax source.',
    section: 'Options',
    doc_type: 'reference',
});

// ── Test 1: Basic match ──────────────────────────────────────────────────────
{
    const hits = engine.search('reload', { limit: 10 });
    assert.deepEqual(hits.map(h => h.title), ['ajax.reload()']);
    assert.equal(hits[0].section, 'API');
    assert.equal(hits[0].doc_type, 'reference');
    assert.equal(typeof hits[0].rank, 'number');
    console.log('✓ Test 1 passed: single match with rank');
}

// ── Test 2: Sanitised hyphenated query matches as a phrase ───────────────────
{
    const hits = engine.search(sanitizeQuery('server-side'), { limit: 10 });
    assert.deepEqual(hits.map(h => h.url), ['https://datatables.net/examples/server_side/simple.html']);
    console.log('✓ Test 2 passed: "server side" phrase search');
}

// ── Test 3: Filters ──────────────────────────────────────────────────────────
{
    assert.deepEqual(engine.search('ajax', { limit: 10, docType: 'manual' }).map(h => h.url),
        ['https://datatables.net/manual/ajax']);
    assert.deepEqual(engine.search('ajax', { limit: 10, section: 'api' }).map(h => h.title),
        ['ajax.reload()']);
    assert.equal(engine.search('ajax', { limit: 10 }).length, 3);
    assert.equal(engine.search('ajax', { limit: 2 }).length, 2);
    console.log('✓ Test 3 passed: doc_type, section substring and limit');
}

// ── Test 4: FTS5 syntax errors propagate ─────────────────────────────────────
{
    assert.throws(() => engine.search('ajax AND', { limit: 10 }));
    console.log('✓ Test 4 passed: malformed FTS query throws');
}

// ── Test 5: Code examples ────────────────────────────────────────────────────
{
    const all = engine.searchExamples('server', { limit: 10 });
    assert.deepEqual(all.map(e => e.language), ['javascript', 'html']);
    assert.equal(all[0].doc_title, 'Server-side processing');
    assert.equal(all[0].title, null);

    const html = engine.searchExamples('server', { limit: 10, language: 'html' });
    assert.deepEqual(html, [{
        doc_title: 'Server-side processing',
        url: 'https://datatables.net/examples/server_side/simple.html',
        title: null,
        code: '<table id="example"></table>',
        language: 'html',
    }]);

    assert.deepEqual(engine.searchExamples('pageLength', { limit: 10 }), []);
    console.log('✓ Test 5 passed: examples joined to matching pages, language filter');
}

// ── Test 6: Name lookup ──────────────────────────────────────────────────────
{
    const doc = engine.findDocument('AJAX.RELOAD');
    assert.ok(doc);
    assert.equal(doc.title, 'ajax.reload()');
    assert.equal(doc.signature, 'ajax.reload( callback, resetPaging )');
    assert.deepEqual(doc.parameters.map(p => p.name), ['callback', 'resetPaging']);
    assert.equal(doc.parameters[0].optional, true);
    assert.equal(doc.parameters[0].default, 'null');
    assert.deepEqual(doc.returns, { type: 'DataTables.Api', description: 'API instance' });
    assert.deepEqual(doc.related, { API: ['ajax.url()'], Options: ['ajax'], Events: [] });
    assert.deepEqual(doc.notes, ['Note: the reload is asynchronous']);
    assert.equal(doc.examples[0].title, 'Reload every 30 seconds');

    assert.equal(engine.findDocument('ajax.reload()')?.url, doc.url);
    console.log('✓ Test 6 passed: lookup with or without "()" and any case');
}

// ── Test 7: Reference pages win name lookups ─────────────────────────────────
{
    assert.equal(engine.findDocument('Ajax')?.url, 'https://datatables.net/reference/option/ajax');
    assert.equal(engine.findDocument('nope'), null);
    assert.equal(engine.findDocument('()'), null);
    console.log('✓ Test 7 passed: reference preferred, unknown names return null');
}

// ── Test 8: Stats ────────────────────────────────────────────────────────────
{
    assert.deepEqual(engine.stats(), {
        total_docs: 5,
        by_type: { reference: 3, example: 1, manual: 1 },
    });
    console.log('✓ Test 8 passed: totals by type');
}

// ── Test 9: Missing database file ────────────────────────────────────────────
{
    assert.throws(() => openSearchEngine('/nonexistent/datatables/docs.db'), {
        message: "Database not found at /nonexistent/datatables/docs.db. Run 'datatables-docs-mcp index' first.",
    });
    console.log('✓ Test 9 passed: missing index reported');
}

db.close();
console.log('\nAll search tests passed.');
