// src/index.ts
import { ExtractionReport } from './types/extraction.types';
import { ExtractionConfig } from './types/config.types';
import { getDefaultExtractionConfig } from './config/extraction-config';
import { ExtractionCoordinator } from './parsers/ExtractionCoordinator';
import { PdfTokenReader } from './parsers/PdfTokenReader';
import * as path from 'path';

export * from './types/extraction.types';
export * from './types/config.types';
export * from './config/extraction-config';
export { ExtractionError, ConfigError } from './utils/errors';
export { LineAssembler } from './parsers/LineAssembler';
export { LineClassifier } from './parsers/LineClassifier';
export { ColumnGridMapper } from './parsers/ColumnGrid';
export { HierarchyBuilder, BuilderState, UNCATEGORIZED_CATEGORY_NAME } from './parsers/HierarchyBuilder';
export { TableOfContentsIndexer } from './parsers/TableOfContentsIndexer';
export { WarningCollector } from './parsers/WarningCollector';
export { ExtractionCoordinator } from './parsers/ExtractionCoordinator';
export { InMemoryTokenSource } from './parsers/InMemoryTokenSource';
export { PdfTokenReader } from './parsers/PdfTokenReader';
export { JsonOutputWriter } from './services/JsonOutputWriter';
export { ExcelRenderer } from './services/ExcelRenderer';
export { FormularyPipeline } from './services/FormularyPipeline';
export type { DocumentOutcome, BatchSummary } from './services/FormularyPipeline';

/**
 * Extract one PDF with the bundled default configuration (or the one given).
 */
export async function extractFormulary(
  pdfPath: string,
  config: ExtractionConfig = getDefaultExtractionConfig()
): Promise<ExtractionReport> {
  const coordinator = new ExtractionCoordinator(new PdfTokenReader(pdfPath), config, path.basename(pdfPath));
  return coordinator.extract();
}
