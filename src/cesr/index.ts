/**
 * CESR primitives used by ACDC
 */

export * from './codex.js';
export * from './utils.js';
export { Diger, diger, type DigerParams } from './diger.js';
export { salt } from './salter.js';
