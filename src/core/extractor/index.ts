export { extractDeclarations, findLeadingStart, findBalancedEnd } from './span-extractor.js';
export type { ExtractOptions } from './span-extractor.js';
