export { fixCommand, fixFile } from './fix.js';
export type { FixCommandOptions, FileFixResult } from './fix.js';
export { configCommand, getGlobalAnalyzer, parseAnalyzerCommand } from './config.js';
