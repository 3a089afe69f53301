/**
 * Textual query classifier.
 *
 * Decides whether an operation needs the write lock by looking at its
 * leading keyword. This is a heuristic over normalized text, not a parser:
 * malformed input still gets a classification, and anything not known to
 * be read-only is treated as a write.
 *
 * @example
 * ```typescript
 * classifyQuery('select * from users')         // 'read'
 * classifyQuery('  begin immediate')           // 'transaction-start'
 * classifyQuery('INSERT INTO users VALUES (1)') // 'write'
 * ```
 */
import type { QueryKind } from './types.js'


/**
 * Keyword that opens a transaction.
 */
const TRANSACTION_START_KEYWORD = 'BEGIN'

/**
 * Leading keywords of statements that never modify the database file.
 *
 * EXPLAIN is treated as read-only in every form, including
 * `EXPLAIN QUERY PLAN`, since SQLite only reports the plan.
 */
const READ_ONLY_KEYWORDS = ['SELECT', 'EXPLAIN'] as const


/**
 * Collapse whitespace and upper-case a query.
 *
 * Tabs, carriage returns and newlines are removed outright, then runs of
 * remaining whitespace collapse to a single space. Idempotent.
 *
 * @example
 * ```typescript
 * normalizeQuery('select\n  *\tfrom t')   // 'SELECT *FROM T'
 * normalizeQuery('  update  t set a = 1 ') // 'UPDATE T SET A = 1'
 * ```
 */
export function normalizeQuery(query: string): string {

    return query
        .replace(/[\t\n\r]/g, '')
        .split(/\s+/)
        .filter(Boolean)
        .join(' ')
        .toUpperCase()
}


/**
 * Whether the query opens a transaction.
 */
export function isTransactionStart(query: string): boolean {

    return normalizeQuery(query).startsWith(TRANSACTION_START_KEYWORD)
}


/**
 * Whether the query may write to the database.
 */
export function isWriteQuery(query: string): boolean {

    const normalized = normalizeQuery(query)

    return !READ_ONLY_KEYWORDS.some((keyword) => normalized.startsWith(keyword))
}


/**
 * Classify a query for locking purposes.
 *
 * Transaction start wins over write: `BEGIN` is also not read-only.
 */
export function classifyQuery(query: string): QueryKind {

    if (isTransactionStart(query)) {

        return 'transaction-start'
    }

    if (isWriteQuery(query)) {

        return 'write'
    }

    return 'read'
}
