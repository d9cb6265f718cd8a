export { fixCode, runFixedPoint, filterCode, DEFAULT_MAX_ITERATIONS } from './fix-code.js';
export { getDiffText } from './unified-diff.js';
