/**
 * FTS5 query sanitiser.
 *
 * The unicode61 tokenizer splits "server-side" into "server" and "side" when
 * indexing, but at query time a bare `server-side` is parsed as a column
 * filter / NOT expression and either changes meaning or raises
 * `no such column: server`. Hyphenated tokens are therefore rewritten into
 * phrase queries: `server-side` → `"server side"`.
 *
 * Queries that already use FTS5 syntax (a quoted phrase or a whole-word
 * AND / OR / NOT anywhere) are returned untouched. That check covers the whole
 * string, not individual tokens.
 */

const FTS_SYNTAX = /".*?"|\b(AND|OR|NOT)\b/i;

export function sanitizeQuery(query: string): string {
    if (FTS_SYNTAX.test(query)) return query;

    // Capturing group keeps the whitespace runs in the split output
    return query
        .split(/(\s+)/)
        .map(token => {
            if (/^\s*$/.test(token) || !token.includes('-')) return token;
            const phrase = token.replace(/-/g, ' ').replace(/"/g, '""');
            return `"${phrase}"`;
        })
        .join('');
}
