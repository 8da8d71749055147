// src/services/FormularyPipeline.ts
import * as path from 'path';
import { ExtractionReport, ExtractionStats, TokenSource } from '../types/extraction.types';
import { ExtractionConfig, PipelineOptions } from '../types/config.types';
import { ExtractionCoordinator } from '../parsers/ExtractionCoordinator';
import { PdfTokenReader } from '../parsers/PdfTokenReader';
import { ExcelRenderer } from './ExcelRenderer';
import { JsonOutputPaths, JsonOutputWriter } from './JsonOutputWriter';
import { FileHelpers } from '../utils/file-helpers';
import { mapWithConcurrency } from '../utils/concurrency';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export type TokenSourceFactory = (pdfPath: string) => TokenSource;

export interface PipelineDependencies {
  tokenSourceFactory?: TokenSourceFactory;
  renderer?: ExcelRenderer;
  jsonWriter?: JsonOutputWriter;
}

export type DocumentStatus = 'success' | 'partial' | 'failed';

export interface DocumentOutcome {
  pdfPath: string;
  // success: JSON and workbook written; partial: JSON written, workbook failed
  status: DocumentStatus;
  outputDir: string;
  jsonPaths?: JsonOutputPaths;
  excelPath?: string;
  excelError?: string;
  error?: string;
  stats?: ExtractionStats;
}

export interface BatchSummary {
  outcomes: DocumentOutcome[];
  succeeded: number;
  partial: number;
  failed: number;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  outputDir: 'output',
  jsonOnly: false,
  concurrency: 1,
  layout: 'banded'
};

export class FormularyPipeline {
  private readonly logger = new Logger('FormularyPipeline');
  private readonly options: PipelineOptions;
  private readonly tokenSourceFactory: TokenSourceFactory;
  private readonly renderer: ExcelRenderer;
  private readonly jsonWriter: JsonOutputWriter;

  constructor(
    private readonly config: ExtractionConfig,
    options: Partial<PipelineOptions> = {},
    deps: PipelineDependencies = {}
  ) {
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options };
    this.tokenSourceFactory = deps.tokenSourceFactory ?? (pdfPath => new PdfTokenReader(pdfPath));
    this.renderer = deps.renderer ?? new ExcelRenderer(this.options.layout);
    this.jsonWriter = deps.jsonWriter ?? new JsonOutputWriter();
  }

  /**
   * Run the extraction only; nothing is written.
   */
  async extract(pdfPath: string): Promise<ExtractionReport> {
    const coordinator = new ExtractionCoordinator(
      this.tokenSourceFactory(pdfPath),
      this.config,
      path.basename(pdfPath)
    );
    return coordinator.extract();
  }

  /**
   * Extract one PDF into <outputDir>/<stem>/: the JSON files, then the workbook unless jsonOnly.
   */
  async processPdf(pdfPath: string): Promise<DocumentOutcome> {
    const stem = FileHelpers.stem(pdfPath);
    const outputDir = path.join(this.options.outputDir, stem);

    this.logger.info(`Processing ${pdfPath}`);

    let report: ExtractionReport;
    try {
      report = await this.extract(pdfPath);
    } catch (error) {
      this.logger.error(`Extraction failed for ${pdfPath}`, error);
      return { pdfPath, status: 'failed', outputDir, error: errorMessage(error) };
    }

    let jsonPaths: JsonOutputPaths;
    try {
      jsonPaths = await this.jsonWriter.write(report.result, outputDir);
    } catch (error) {
      this.logger.error(`Could not write JSON output for ${pdfPath}`, error);
      return { pdfPath, status: 'failed', outputDir, error: errorMessage(error), stats: report.stats };
    }

    this.logSummary(pdfPath, report.stats, report.result.warnings.length);

    const outcome: DocumentOutcome = { pdfPath, status: 'success', outputDir, jsonPaths, stats: report.stats };
    if (this.options.jsonOnly) {
      return outcome;
    }

    const excelPath = path.join(outputDir, `${stem}.xlsx`);
    try {
      this.renderer.render({
        categories: report.result.categories,
        warnings: report.result.warnings,
        tableOfContents: report.result.table_of_contents
      }, excelPath);
      outcome.excelPath = excelPath;
    } catch (error) {
      this.logger.error(`Workbook rendering failed for ${pdfPath}; JSON output is kept`, error);
      outcome.status = 'partial';
      outcome.excelError = errorMessage(error);
    }

    return outcome;
  }

  /**
   * Every PDF in a directory, up to `concurrency` documents at a time.
   * One failing document never stops the others.
   */
  async processDirectory(pdfDir: string): Promise<BatchSummary> {
    const pdfFiles = FileHelpers.listPdfFiles(pdfDir);
    if (!pdfFiles.length) {
      this.logger.warn(`No PDF files found in ${pdfDir}`);
    } else {
      this.logger.info(`Found ${pdfFiles.length} PDF file(s) in ${pdfDir}`);
    }

    const outcomes = await mapWithConcurrency(pdfFiles, this.options.concurrency, pdfPath => this.processPdf(pdfPath));

    const summary: BatchSummary = {
      outcomes,
      succeeded: outcomes.filter(o => o.status === 'success').length,
      partial: outcomes.filter(o => o.status === 'partial').length,
      failed: outcomes.filter(o => o.status === 'failed').length
    };

    this.logger.info(
      `Batch complete: ${summary.succeeded} succeeded, ${summary.partial} partial, ${summary.failed} failed`
    );
    return summary;
  }

  /**
   * Render a workbook from an existing extracted_data.json; written as <dir name>.xlsx beside it.
   */
  async renderFromJson(jsonPath: string): Promise<string> {
    const loaded = await this.jsonWriter.load(jsonPath);
    const dir = path.dirname(path.resolve(jsonPath));
    const excelPath = path.join(dir, `${path.basename(dir)}.xlsx`);

    this.renderer.render(loaded, excelPath);
    return excelPath;
  }

  private logSummary(pdfPath: string, stats: ExtractionStats, warningCount: number): void {
    this.logger.info('='.repeat(60));
    this.logger.info(`EXTRACTION SUMMARY: ${path.basename(pdfPath)}`);
    this.logger.info('='.repeat(60));
    this.logger.info(`Pages: ${stats.pages}`);
    this.logger.info(`TOC entries: ${stats.tocEntries}`);
    this.logger.info(`Categories: ${stats.categories}`);
    this.logger.info(`Subcategories: ${stats.subCategories}`);
    this.logger.info(`Rows: ${stats.rowsAppended} (${stats.rowsJoined} wrapped lines joined)`);
    this.logger.info(`Warnings: ${warningCount}`);
    this.logger.info('='.repeat(60));
  }
}
