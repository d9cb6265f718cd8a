export * from './python-tokenizer.js';
export * from './python-literal.js';
