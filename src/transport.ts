/**
 * Newline-delimited JSON-RPC over a pair of streams (stdin/stdout in production).
 *
 * Lines are handled strictly one at a time: the next line is not dispatched
 * until the previous response has been written, so responses come back in
 * request order.
 */

import { once } from 'events';
import { createInterface } from 'readline';
import type { Logger } from './log.js';
import { silentLogger } from './log.js';
import type { McpSession } from './session.js';

export async function serveStdio(
    session: McpSession,
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
    log: Logger = silentLogger,
): Promise<void> {
    const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });

    for await (const line of lines) {
        if (line.trim() === '') continue;

        const response = await session.receive(line);
        if (response !== null && !output.write(`${JSON.stringify(response)}\n`)) {
            await once(output, 'drain');
        }
    }

    log('Input closed, shutting down');
}
