/**
 * Test: McpSession lifecycle and dispatch
 *
 * Drives a session line by line, the same way the stdio loop does:
 * 1. Requests before the handshake completes are rejected with -32002
 * 2. notifications/initialized is the only way to become ready
 * 3. Method, param and tool failures map to their error codes
 */

import assert from 'node:assert/strict';
import { silentLogger } from '../src/log.js';
import { McpSession } from '../src/session.js';
import type { DocsSearch } from '../src/search.js';

console.log('Running session tests...\n');

const emptySearch: DocsSearch = {
    search: () => [],
    searchExamples: () => [],
    findDocument: () => null,
    stats: () => ({ total_docs: 0, by_type: {} }),
};

function newSession(search: () => DocsSearch = () => emptySearch): McpSession {
    return new McpSession({ search, logger: silentLogger });
}

const line = (message: object): string => JSON.stringify({ jsonrpc: '2.0', ...message });

const INITIALIZED = line({ method: 'notifications/initialized' });

async function readySession(search?: () => DocsSearch): Promise<McpSession> {
    const session = newSession(search);
    await session.receive(line({ id: 0, method: 'initialize', params: {} }));
    await session.receive(INITIALIZED);
    return session;
}

// ── Test 1: Requests before the handshake are rejected ───────────────────────
{
    const session = newSession();
    for (const [id, method] of [[1, 'tools/list'], ['x', 'tools/call'], [3, 'ping'], [4, 'no/such/method']] as const) {
        const response = await session.receive(line({ id, method }));
        assert.deepEqual(response, {
            jsonrpc: '2.0',
            id,
            error: { code: -32002, message: 'Server not initialized. Send initialize request first.' },
        });
    }
    assert.equal(session.state, 'awaiting-handshake');
    console.log('✓ Test 1 passed: -32002 echoes the request id');
}

// ── Test 2: initialize does not make the session ready ───────────────────────
{
    const session = newSession();
    const response = await session.receive(line({
        id: 1,
        method: 'initialize',
        params: { protocolVersion: '2024-11-05', clientInfo: { name: 'test' } },
    }));
    assert.deepEqual(response, {
        jsonrpc: '2.0',
        id: 1,
        result: {
            protocolVersion: '2024-11-05',
            serverInfo: { name: 'datatables-mcp', version: '1.0.0' },
            capabilities: { tools: {}, resources: {}, prompts: {} },
        },
    });
    assert.equal(session.state, 'awaiting-handshake');

    assert.equal(await session.receive(INITIALIZED), null);
    assert.equal(session.state, 'ready');

    assert.equal(await session.receive(INITIALIZED), null);
    assert.equal(session.state, 'ready');
    console.log('✓ Test 2 passed: ready only after notifications/initialized, repeat is a no-op');
}

// ── Test 3: Unknown protocol versions fall back ──────────────────────────────
{
    const session = newSession();
    const response = await session.receive(line({ id: 2, method: 'initialize', params: { protocolVersion: '1999-01-01' } }));
    assert.ok(response && 'result' in response);
    assert.deepEqual(response.result, {
        protocolVersion: '2024-11-05',
        serverInfo: { name: 'datatables-mcp', version: '1.0.0' },
        capabilities: { tools: {}, resources: {}, prompts: {} },
    });
    console.log('✓ Test 3 passed: unsupported protocol version answered with 2024-11-05');
}

// ── Test 3b: Server identity can be replaced ─────────────────────────────────
{
    const session = new McpSession({
        search: () => emptySearch,
        logger: silentLogger,
        serverInfo: { name: 'docs-test', version: '2.3.4' },
    });
    const response = await session.receive(line({ id: 7, method: 'initialize' }));
    assert.ok(response && 'result' in response);
    assert.deepEqual(response.result, {
        protocolVersion: '2024-11-05',
        serverInfo: { name: 'docs-test', version: '2.3.4' },
        capabilities: { tools: {}, resources: {}, prompts: {} },
    });
    console.log('✓ Test 3b passed: serverInfo option overrides the built-in identity');
}

// ── Test 4: Notifications never produce output ───────────────────────────────
{
    const session = newSession();
    assert.equal(await session.receive(line({ method: 'notifications/cancelled', params: { requestId: 1 } })), null);
    assert.equal(await session.receive(line({ method: 'tools/list' })), null);
    assert.equal(session.state, 'awaiting-handshake');
    assert.equal(await session.receive(line({ id: 5, result: {} })), null);
    console.log('✓ Test 4 passed: notifications and peer responses get no reply');
}

// ── Test 5: Parse errors ─────────────────────────────────────────────────────
{
    const session = newSession();
    const response = await session.receive('{not json');
    assert.ok(response && 'error' in response);
    assert.equal(response.id, null);
    assert.equal(response.error.code, -32700);
    assert.ok(response.error.message.startsWith('Parse error: '));

    assert.deepEqual(await session.receive('{"jsonrpc":"2.0","id":1}'), {
        jsonrpc: '2.0',
        id: null,
        error: { code: -32700, message: 'Parse error: missing method' },
    });
    console.log('✓ Test 5 passed: malformed lines answered with id null');
}

// ── Test 6: Ready session methods ────────────────────────────────────────────
{
    const session = await readySession();
    assert.deepEqual(await session.receive(line({ id: 1, method: 'ping' })), { jsonrpc: '2.0', id: 1, result: {} });
    assert.deepEqual(await session.receive(line({ id: 2, method: 'resources/list' })), { jsonrpc: '2.0', id: 2, result: { resources: [] } });
    assert.deepEqual(await session.receive(line({ id: 3, method: 'prompts/list' })), { jsonrpc: '2.0', id: 3, result: { prompts: [] } });

    const list = await session.receive(line({ id: 4, method: 'tools/list' }));
    assert.ok(list && 'result' in list);
    const names = JSON.stringify(list.result);
    for (const name of ['search_datatables', 'get_function_details', 'search_by_example', 'search_by_topic', 'get_related_items']) {
        assert.ok(names.includes(`"name":"${name}"`), `tools/list includes ${name}`);
    }

    assert.deepEqual(await session.receive(line({ id: 5, method: 'foo/bar' })), {
        jsonrpc: '2.0',
        id: 5,
        error: { code: -32601, message: 'Method not found: foo/bar' },
    });
    console.log('✓ Test 6 passed: ping, lists and unknown methods');
}

// ── Test 7: tools/call ───────────────────────────────────────────────────────
{
    const session = await readySession();

    assert.deepEqual(await session.receive(line({
        id: 10,
        method: 'tools/call',
        params: { name: 'search_datatables', arguments: { query: 'ajax' } },
    })), {
        jsonrpc: '2.0',
        id: 10,
        result: { content: [{ type: 'text', text: 'No results found for query: "ajax"' }] },
    });

    assert.deepEqual(await session.receive(line({ id: 11, method: 'tools/call', params: { arguments: {} } })), {
        jsonrpc: '2.0',
        id: 11,
        error: { code: -32602, message: 'Invalid params: name is required' },
    });

    assert.deepEqual(await session.receive(line({ id: 12, method: 'tools/call', params: { name: 'search_datatables' } })), {
        jsonrpc: '2.0',
        id: 12,
        error: { code: -32603, message: 'query parameter is required' },
    });

    assert.deepEqual(await session.receive(line({ id: 13, method: 'tools/call', params: { name: 'unknown_tool' } })), {
        jsonrpc: '2.0',
        id: 13,
        error: { code: -32603, message: 'Unknown tool: unknown_tool' },
    });
    console.log('✓ Test 7 passed: tool results and tool errors');
}

// ── Test 8: Backend failures become internal errors ──────────────────────────
{
    const session = await readySession(() => {
        throw new Error("Database not found at /tmp/none.db. Run 'datatables-docs-mcp index' first.");
    });
    const response = await session.receive(line({
        id: 'q',
        method: 'tools/call',
        params: { name: 'get_function_details', arguments: { name: 'draw()' } },
    }));
    assert.deepEqual(response, {
        jsonrpc: '2.0',
        id: 'q',
        error: { code: -32603, message: "Database not found at /tmp/none.db. Run 'datatables-docs-mcp index' first." },
    });

    // The session keeps serving after a failure
    assert.deepEqual(await session.receive(line({ id: 'r', method: 'ping' })), { jsonrpc: '2.0', id: 'r', result: {} });
    console.log('✓ Test 8 passed: thrown backend errors answered with -32603');
}

// ── Test 9: Sessions are independent ─────────────────────────────────────────
{
    const first = await readySession();
    const second = newSession();
    assert.equal(first.state, 'ready');
    assert.equal(second.state, 'awaiting-handshake');
    console.log('✓ Test 9 passed: readiness is per session');
}

console.log('\nAll session tests passed.');
