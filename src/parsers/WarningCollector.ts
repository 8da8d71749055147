// src/parsers/WarningCollector.ts
import { AssembledLine, ExtractionWarning, WarningReason } from '../types/extraction.types';
import { Logger } from '../utils/logger';

const CONTEXT_MAX_LENGTH = 160;

/**
 * Append-only record of everything that could not be placed in the hierarchy.
 * Warnings are frozen when recorded.
 */
export class WarningCollector {
  private readonly warnings: ExtractionWarning[] = [];
  private readonly lastLineByPage = new Map<number, string>();
  private readonly logger: Logger;

  constructor(logger: Logger = new Logger('WarningCollector')) {
    this.logger = logger;
  }

  /**
   * Remember a placed line so later warnings on the same page can point at their neighbour.
   */
  noteLine(line: AssembledLine): void {
    this.lastLineByPage.set(line.pageNumber, line.text);
  }

  recordLine(line: AssembledLine, reason: WarningReason, detail?: string): ExtractionWarning {
    return this.record(line.pageNumber, line.text, reason, this.lastLineByPage.get(line.pageNumber), detail);
  }

  record(
    pageNumber: number,
    rawText: string,
    reason: WarningReason,
    context?: string,
    detail?: string
  ): ExtractionWarning {
    const warning: ExtractionWarning = Object.freeze({
      pageNumber,
      rawText,
      reason,
      ...(context ? { context: context.slice(0, CONTEXT_MAX_LENGTH) } : {})
    });
    this.warnings.push(warning);
    this.logger.debug(`page ${pageNumber} ${reason}: "${rawText}"${detail ? ` (${detail})` : ''}`);
    return warning;
  }

  count(reasons?: WarningReason[]): number {
    if (!reasons) return this.warnings.length;
    return this.warnings.filter(w => reasons.includes(w.reason)).length;
  }

  list(): ExtractionWarning[] {
    return this.warnings.slice();
  }
}
