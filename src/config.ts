import path from 'path';
import os from 'os';
import { z } from 'zod';

export interface ServerInfo {
    name: string;
    version: string;
}

export const SERVER_INFO: ServerInfo = { name: 'datatables-mcp', version: '1.0.0' };

export const DEFAULT_DB_PATH = path.join(os.homedir(), '.datatables-docs-mcp', 'docs.db');
export const DEFAULT_BASE_URL = 'https://datatables.net';

const EnvSchema = z.object({
    DATATABLES_MCP_DB: z.string().min(1).default(DEFAULT_DB_PATH),
    DATATABLES_MCP_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
    DATATABLES_MCP_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(2),
});

export interface Config {
    dbPath: string;
    baseUrl: string;
    concurrency: number;
}

/**
 * Reads configuration from environment variables. Throws with the offending
 * variable named when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const parsed = EnvSchema.safeParse({
        DATATABLES_MCP_DB: env.DATATABLES_MCP_DB || undefined,
        DATATABLES_MCP_BASE_URL: env.DATATABLES_MCP_BASE_URL || undefined,
        DATATABLES_MCP_CONCURRENCY: env.DATATABLES_MCP_CONCURRENCY || undefined,
    });
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid configuration: ${issue?.path.join('.')}: ${issue?.message}`);
    }

    return {
        dbPath: path.resolve(parsed.data.DATATABLES_MCP_DB),
        baseUrl: parsed.data.DATATABLES_MCP_BASE_URL.replace(/\/+$/, ''),
        concurrency: parsed.data.DATATABLES_MCP_CONCURRENCY,
    };
}
