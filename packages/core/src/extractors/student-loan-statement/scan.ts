/**
 * Statement Scan
 *
 * Per-parse state shared by the field and sequence extractors: the
 * normalized lines, their joined text, the date parser and window, and a
 * ledger of which strategy produced each field.
 */

import type { NormalizedDocument } from '../../types';
import { DateParser, DateWindow, compareDates } from '../text/dates';
import { joinLines } from '../text/normalize';
import { config } from '../../config';
import { logger } from '../../logger';
import { fieldStrategyCounter } from '../../metrics';

export interface ScanOptions {
  /** Anchor for the date validity window and two-digit years */
  referenceDate?: Date;
  headerWindowLines?: number;
  sectionMaxLines?: number;
}

export class StatementScan {
  readonly lines: NormalizedDocument;
  readonly text: string;
  readonly dateParser: DateParser;
  readonly dateWindow: DateWindow;
  readonly headerWindowLines: number;
  readonly sectionMaxLines: number;

  private readonly strategies = new Map<string, string>();
  private readonly warningList: string[] = [];

  constructor(lines: NormalizedDocument, options: ScanOptions = {}) {
    const referenceDate = options.referenceDate ?? new Date();
    this.lines = lines;
    this.text = joinLines(lines);
    this.dateParser = new DateParser(referenceDate);
    this.dateWindow = new DateWindow(referenceDate);
    this.headerWindowLines = options.headerWindowLines ?? config.headerWindowLines;
    this.sectionMaxLines = options.sectionMaxLines ?? config.sectionMaxLines;
  }

  get headerLines(): readonly string[] {
    return this.lines.slice(0, this.headerWindowLines);
  }

  /**
   * In-window dates in text, in scanner order.
   */
  datesIn(text: string): Date[] {
    return this.dateWindow.filter(this.dateParser.extractDates(text));
  }

  /**
   * Parse one date string, rejecting dates outside the window.
   */
  parseDateInWindow(dateString: string): Date | null {
    const date = this.dateParser.parseDate(dateString);
    return date && this.dateWindow.contains(date) ? date : null;
  }

  /**
   * Earliest in-window date anywhere in the document.
   */
  earliestDate(): Date | null {
    const dates = this.lines.flatMap((line) => this.datesIn(line)).sort(compareDates);
    return dates[0] ?? null;
  }

  /**
   * Note which strategy produced a field.
   */
  recordStrategy(field: string, strategy: string): void {
    this.strategies.set(field, strategy);
    fieldStrategyCounter.inc({ field, strategy });
    logger.debug('Field resolved', { field, strategy });
  }

  warn(message: string): void {
    this.warningList.push(message);
    logger.warn(message);
  }

  get fieldStrategies(): Record<string, string> {
    return Object.fromEntries(this.strategies);
  }

  get warnings(): string[] {
    return [...this.warningList];
  }
}

/**
 * True when the lower-cased line contains any keyword.
 */
export function containsKeyword(line: string, keywords: readonly string[]): boolean {
  const lower = line.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}
