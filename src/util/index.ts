export { ok, fail } from './Result.js';
export type { Result } from './Result.js';
