/**
 * Schema module: the zod source of every data shape.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './snapshot.js';
export * from './action.js';
export * from './trace.js';
export * from './traceDocument.js';
export * from './config.js';
