/**
 * Scanner module exports.
 */
export { scanFiles, getReferences, DEFAULT_SCAN_PATTERN } from './scanner.js';
export type { FileReferences, ScanOptions, ScanResult } from './types.js';
