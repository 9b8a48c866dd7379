export * from './types/Product.js';
export * from './types/errors.js';
export * from './config/catalogConfig.js';
export { loadCatalogDocument, isMapping } from './catalog/loadCatalogDocument.js';
export {
  extractName,
  extractShortId,
  extractOptionalField,
  isYamlFilename,
  stripYamlExtension,
} from './catalog/extractFields.js';
export { walkCatalog, walkCategory, listCategories, listYamlFiles } from './catalog/walkCatalog.js';
export {
  buildCategoryReport,
  buildMasterReport,
  generateAllCategoryCsvs,
  generateCategoryCsv,
  generateMasterCsv,
  generateRegionCsvs,
  toProductRecord,
  type CategoryReportResult,
  type CsvGenerationSummary,
  type MasterReportResult,
  type RegionReportResult,
} from './report/buildCsvReports.js';
export { archiveStateReports, isStateReportName } from './report/archiveStateReports.js';
export {
  normalizeCatalog,
  normalizeCategory,
  planNormalization,
  type NormalizeAction,
  type NormalizeOutcome,
  type NormalizeRunResult,
  type NormalizeTally,
} from './rename/normalizeIdentifiers.js';
export { createDryRunDirectoryView, createLiveDirectoryView, type DirectoryView } from './rename/directoryView.js';
