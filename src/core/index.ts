// Core types
export * from './types.js';

// Extraction
export { extractDeclarations, findLeadingStart, findBalancedEnd } from './extractor/index.js';
export type { ExtractOptions } from './extractor/index.js';

// Categorization
export { createCategorizer } from './categorizer.js';
export type { Categorizer } from './categorizer.js';

// Writers
export {
  groupByCategory, renderModule, moduleFileName, writeModuleFiles,
  sortLabels, renderManifest, writeManifest, differsOnDisk,
} from './writer/index.js';

// Pipeline
export { planSplit, executeSplit, splitFile, checkSplit, findDuplicates, readSourceFile } from './splitter.js';
export type { PlanOptions, ExecuteOptions } from './splitter.js';

// Languages
export { getLanguageProfile, getSupportedLanguages, isLanguageId, rustProfile, typescriptProfile } from './language/index.js';

// Config
export { resolveConfig, saveConfig, loadTaxonomy, parseTaxonomy, getConfigPath, CONFIG_FILE } from './config.js';
export type { ConfigOverrides } from './config.js';
