/**
 * Diagnostic logging.
 *
 * stdout carries the JSON-RPC stream, so every diagnostic line goes to stderr.
 */

export type Logger = (message: string) => void;

export function createLogger(scope: string, stream: NodeJS.WritableStream = process.stderr): Logger {
    return (message: string) => {
        stream.write(`[${new Date().toISOString()}] [${scope}] ${message}\n`);
    };
}

/** Logger that drops everything. Used by tests and quiet CLI paths. */
export const silentLogger: Logger = () => { };

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
