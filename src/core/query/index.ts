/**
 * Query classification exports.
 */
export type { QueryKind } from './types.js';

export {
    normalizeQuery,
    isTransactionStart,
    isWriteQuery,
    classifyQuery,
} from './classifier.js';
