#!/usr/bin/env node
// src/cli/extract.ts
import * as dotenv from 'dotenv';
import * as path from 'path';
import chalk from 'chalk';
import { Command } from 'commander';
import { loadExtractionConfig } from '../config/extraction-config';
import { DocumentOutcome, FormularyPipeline } from '../services/FormularyPipeline';
import { SpreadsheetLayout } from '../types/config.types';
import { ConfigError, errorMessage } from '../utils/errors';
import { FileHelpers } from '../utils/file-helpers';
import { initializeLogger } from '../utils/log-config-loader';
import { Logger, getLogFilePaths } from '../utils/logger';

dotenv.config();

const logger = new Logger('ExtractCLI');

interface ExtractOptions {
  pdfDir?: string;
  outputDir: string;
  jsonOnly?: boolean;
  excelOnly?: boolean;
  jsonPath?: string;
  config?: string;
  logLevel?: string;
  concurrency: string;
  lenient?: boolean;
  layout: string;
}

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'];
const LAYOUTS: SpreadsheetLayout[] = ['banded', 'sheet-per-category'];

function isLayout(value: string): value is SpreadsheetLayout {
  return LAYOUTS.some(layout => layout === value);
}

function fail(message: string): never {
  console.error(chalk.red(`Error: ${message}`));
  process.exit(1);
}

function printOutcome(outcome: DocumentOutcome): void {
  const name = path.basename(outcome.pdfPath);
  if (outcome.status === 'failed') {
    console.log(chalk.red(`✗ ${name}: ${outcome.error ?? 'unknown error'}`));
    return;
  }

  const stats = outcome.stats;
  const counts = stats
    ? `${stats.categories} categories, ${stats.subCategories} subcategories, ${stats.rowsAppended} rows, ${stats.rowWarnings} row warnings`
    : '';
  const marker = outcome.status === 'success' ? chalk.green('✓') : chalk.yellow('!');
  console.log(`${marker} ${chalk.bold(name)}: ${counts}`);
  console.log(chalk.gray(`  JSON: ${outcome.jsonPaths?.categories ?? outcome.outputDir}`));
  if (outcome.excelPath) {
    console.log(chalk.gray(`  Excel: ${outcome.excelPath}`));
  }
  if (outcome.excelError) {
    console.log(chalk.yellow(`  Excel rendering failed: ${outcome.excelError}`));
  }
}

const program = new Command();

program
  .name('formulary-extract')
  .description('Extract category/subcategory/row formulary data from PDF documents into JSON and Excel')
  .argument('[pdfPath]', 'PDF file to process')
  .option('--pdf-dir <dir>', 'process every PDF in a directory')
  .option('-o, --output-dir <dir>', 'output directory', 'output')
  .option('--json-only', 'write JSON files only')
  .option('--excel-only', 'render a workbook from an existing extracted_data.json')
  .option('--json-path <file>', 'extracted_data.json to render in --excel-only mode')
  .option('-c, --config <file>', 'extraction configuration file merged over the defaults')
  .option('--log-level <level>', 'log level (error, warn, info, debug)')
  .option('--concurrency <n>', 'documents processed at once in --pdf-dir mode', '1')
  .option('--lenient', 'assign misaligned row cells to the nearest column instead of rejecting the row')
  .option('--layout <layout>', 'workbook layout (banded, sheet-per-category)', 'banded')
  .action(async (pdfPath: string | undefined, options: ExtractOptions) => {
    if (options.logLevel && !LOG_LEVELS.includes(options.logLevel)) {
      fail(`--log-level must be one of ${LOG_LEVELS.join(', ')}`);
    }
    initializeLogger(undefined, options.logLevel);

    if (options.jsonOnly && options.excelOnly) {
      fail('--json-only and --excel-only cannot be combined');
    }
    if (!isLayout(options.layout)) {
      fail(`--layout must be one of ${LAYOUTS.join(', ')}`);
    }
    const concurrency = Number.parseInt(options.concurrency, 10);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      fail('--concurrency must be a positive integer');
    }

    let pipeline: FormularyPipeline;
    try {
      const config = loadExtractionConfig(
        options.config ?? process.env.FORMULARY_CONFIG,
        options.lenient ? { lenient_rows: true } : {}
      );
      pipeline = new FormularyPipeline(config, {
        outputDir: options.outputDir,
        jsonOnly: options.jsonOnly ?? false,
        concurrency,
        layout: options.layout
      });
    } catch (error) {
      if (error instanceof ConfigError) {
        fail(error.message);
      }
      throw error;
    }

    if (options.excelOnly) {
      if (!options.jsonPath) {
        fail('--excel-only requires --json-path <file>');
      }
      const excelPath = await pipeline.renderFromJson(options.jsonPath);
      console.log(chalk.green(`✓ Workbook written: ${excelPath}`));
      return;
    }

    if (options.pdfDir) {
      if (!FileHelpers.isDirectory(options.pdfDir)) {
        fail(`PDF directory not found: ${options.pdfDir}`);
      }
      const summary = await pipeline.processDirectory(options.pdfDir);
      summary.outcomes.forEach(printOutcome);
      console.log(chalk.bold(
        `\n${summary.succeeded} succeeded, ${summary.partial} partial, ${summary.failed} failed`
      ));
      if (summary.failed > 0) {
        process.exitCode = 1;
      }
      return;
    }

    if (!pdfPath) {
      fail('provide a PDF path or --pdf-dir <dir>');
    }

    const outcome = await pipeline.processPdf(pdfPath);
    printOutcome(outcome);
    if (outcome.status === 'failed') {
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).then(() => {
  const logFiles = getLogFilePaths();
  if (logFiles) {
    console.log(chalk.gray(`Log: ${logFiles.combined}`));
  }
}).catch(error => {
  logger.error('Extraction run failed', error);
  console.error(chalk.red(`Fatal error: ${errorMessage(error)}`));
  process.exit(1);
});
