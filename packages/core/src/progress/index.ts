export { ProgressStreamParser, parseProgressRecord, formatProgressLine } from './progress-parser.js';
export type { ProgressSample } from './types.js';
