export { groupByCategory, renderModule, moduleFileName, writeModuleFiles } from './module-writer.js';
export { sortLabels, renderManifest, writeManifest } from './index-generator.js';
export { differsOnDisk } from './files.js';
