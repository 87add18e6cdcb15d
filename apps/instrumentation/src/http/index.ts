export { HttpInstrumentation } from './HttpInstrumentation.js';
export type { FetchLike } from './HttpInstrumentation.js';
