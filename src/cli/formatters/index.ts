export { HumanFormatter, NO_VIOLATIONS_MESSAGE } from './human.js';
export { JsonFormatter } from './json.js';
export type { IFormatter, FormatOptions, OutputFormat } from './types.js';
