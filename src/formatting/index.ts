export { PatternFormatter, JsonFormatter, DEFAULT_PATTERN } from './formatter.js';
export type { Formatter } from './formatter.js';
