// src/parsers/ExtractionCoordinator.ts
import {
  ClassifiedLine,
  ExtractionReport,
  ExtractionResult,
  ExtractionStats,
  LineRole,
  PageLayout,
  TokenSource,
  WarningReason
} from '../types/extraction.types';
import { ExtractionConfig } from '../types/config.types';
import { ColumnGridMapper } from './ColumnGrid';
import { BuilderState, HierarchyBuilder } from './HierarchyBuilder';
import { LineAssembler } from './LineAssembler';
import { LineClassifier } from './LineClassifier';
import { TableOfContentsIndexer } from './TableOfContentsIndexer';
import { WarningCollector } from './WarningCollector';
import { ExtractionError, errorMessage } from '../utils/errors';
import { median } from '../utils/layout-math';
import { Logger } from '../utils/logger';

const ROW_WARNING_REASONS = [WarningReason.MALFORMED_ROW, WarningReason.ROW_BEFORE_SUBCATEGORY];

function emptyRoleCounts(): Record<LineRole, number> {
  return {
    [LineRole.CATEGORY_HEADER]: 0,
    [LineRole.SUBCATEGORY_HEADER]: 0,
    [LineRole.COLUMN_HEADER]: 0,
    [LineRole.DATA_ROW]: 0,
    [LineRole.TOC_ENTRY]: 0,
    [LineRole.AMBIGUOUS_HEADER]: 0,
    [LineRole.NOISE]: 0
  };
}

/**
 * Drives one document's pages, in physical order, through assembly, classification,
 * the TOC indexer and the hierarchy builder. One instance per document; extract() runs once.
 */
export class ExtractionCoordinator {
  private readonly assembler: LineAssembler;
  private readonly classifier: LineClassifier;
  private readonly warnings: WarningCollector;
  private readonly toc: TableOfContentsIndexer;
  private readonly builder: HierarchyBuilder;
  private readonly roleCounts = emptyRoleCounts();
  // Data-row font sizes seen so far; their median is the body size once any exist
  private readonly rowFontSizes: number[] = [];
  private started = false;
  private lineCount = 0;

  constructor(
    private readonly source: TokenSource,
    private readonly config: ExtractionConfig,
    private readonly sourceName: string = 'document',
    private readonly logger: Logger = new Logger('ExtractionCoordinator')
  ) {
    this.assembler = new LineAssembler(config);
    this.classifier = new LineClassifier(config);
    this.warnings = new WarningCollector(logger);
    this.toc = new TableOfContentsIndexer();
    this.builder = new HierarchyBuilder(new ColumnGridMapper(config), this.warnings, logger);
  }

  isInFrontMatter(): boolean {
    return this.toc.isOpen();
  }

  async extract(): Promise<ExtractionReport> {
    if (this.started) {
      throw new Error('ExtractionCoordinator.extract() may only run once per instance');
    }
    this.started = true;

    let pageCount: number;
    try {
      pageCount = await this.source.open();
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError('UNREADABLE', this.sourceName, `Cannot open document: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.info(`Extracting ${pageCount} page(s) from ${this.sourceName}`);

    let tokenTotal = 0;
    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
      if (this.toc.isOpen() && pageNumber > this.config.frontMatterPageLimit) {
        this.endFrontMatter(`page limit ${this.config.frontMatterPageLimit} reached`);
      }
      tokenTotal += await this.processPage(pageNumber);
    }

    if (tokenTotal === 0) {
      throw new ExtractionError('NO_TEXT', this.sourceName, 'Document contains no extractable text (image-only or empty)');
    }

    const report = this.assemble(pageCount);
    this.verifyRowAccounting(report.stats);
    return report;
  }

  private async processPage(pageNumber: number): Promise<number> {
    const page = await this.source.readPage(pageNumber);
    if (!page.tokens.length) {
      this.warnings.record(pageNumber, '', WarningReason.PAGE_WITHOUT_TEXT);
      return 0;
    }

    const assembled = this.assembler.assemble(page);
    const lines = assembled.lines;
    const layout = this.documentLayout(assembled.layout);
    this.lineCount += lines.length;

    for (const line of lines) {
      const classified = this.classifier.classify(line, {
        frontMatter: this.scanningFrontMatter(),
        layout,
        activeGrid: this.builder.getActiveGrid()
      });
      this.roleCounts[classified.role]++;
      if (classified.role === LineRole.DATA_ROW && line.fontSize > 0) {
        this.rowFontSizes.push(line.fontSize);
      }
      this.dispatch(classified);
      if (classified.role !== LineRole.NOISE) {
        this.warnings.noteLine(line);
      }
    }

    this.logger.debug(`Page ${pageNumber}: ${lines.length} lines, builder ${this.builder.getState()}`);
    return page.tokens.length;
  }

  private dispatch(classified: ClassifiedLine): void {
    if (classified.role === LineRole.TOC_ENTRY) {
      this.toc.add(classified);
      return;
    }

    if (
      classified.role === LineRole.CATEGORY_HEADER &&
      this.toc.isOpen() &&
      classified.confidence >= this.config.minHeaderConfidence
    ) {
      this.endFrontMatter(`category "${classified.name}" on page ${classified.line.pageNumber}`);
    }

    this.builder.consume(classified);
  }

  // TOC and title matching apply only before any category opens, weak ones included
  private scanningFrontMatter(): boolean {
    return this.toc.isOpen() && this.builder.getState() === BuilderState.NO_OPEN_CATEGORY;
  }

  private documentLayout(pageLayout: PageLayout): PageLayout {
    if (!this.rowFontSizes.length) return pageLayout;
    return { ...pageLayout, bodyFontSize: median(this.rowFontSizes) };
  }

  private endFrontMatter(reason: string): void {
    this.toc.close();
    this.logger.debug(`Front matter ended: ${reason}`);
  }

  private assemble(pageCount: number): ExtractionReport {
    const categories = this.builder.finish();
    const result: ExtractionResult = {
      categories,
      warnings: this.warnings.list(),
      table_of_contents: this.toc.list()
    };

    const rowCounts = this.builder.getRowCounts();
    const stats: ExtractionStats = {
      pages: pageCount,
      lines: this.lineCount,
      roleCounts: { ...this.roleCounts },
      dataRowCandidates: this.roleCounts[LineRole.DATA_ROW],
      rowsAppended: rowCounts.appended,
      rowsJoined: rowCounts.joined,
      rowWarnings: this.warnings.count(ROW_WARNING_REASONS),
      categories: categories.length,
      subCategories: categories.reduce((sum, c) => sum + c.subCategories.length, 0),
      tocEntries: result.table_of_contents.length
    };

    return { result, stats };
  }

  private verifyRowAccounting(stats: ExtractionStats): void {
    if (stats.rowsAppended + stats.rowsJoined + stats.rowWarnings !== stats.dataRowCandidates) {
      this.logger.error(
        `Row accounting mismatch in ${this.sourceName}: ${stats.rowsAppended} rows + ${stats.rowsJoined} joined ` +
        `+ ${stats.rowWarnings} row warnings ` +
        `!= ${stats.dataRowCandidates} data-row candidates`
      );
    }
  }
}
