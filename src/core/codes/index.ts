export * from './code-extractor';
export * from './duplicate-cache';
