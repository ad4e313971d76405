/**
 * Quote Duplicate Scanner
 *
 * Compares a candidate (quote, author) against every stored quote. There is
 * no index: each check drains the whole quotes table, which keeps the
 * verdicts exact while the corpus stays in the low thousands. A larger corpus
 * would need a precomputed similarity index (shingles plus an inverted index).
 */

import type { IStorage } from '../../storage';
import { scanQuotes } from '../../quotes/quoteRecords';
import { withSource } from '../../logger';
import { metrics, type DuplicateCheckOutcome, type DuplicateCheckSite } from '../../metrics';
import { toError } from '../../types/errors';
import { classifyQuotePair } from './quoteMatcher';

const log = withSource('duplicates');

/** Matches returned to callers; the count still reports every match. */
export const MAX_REPORTED_DUPLICATES = 5;

export interface DuplicateMatch {
  id: string;
  quote: string;
  author: string;
  createdAt: string;
  matchReason: string;
}

export interface DuplicateReport {
  isDuplicate: boolean;
  duplicateCount: number;
  duplicates: DuplicateMatch[];
  message: string;
}

export function buildDuplicateReport(matches: DuplicateMatch[]): DuplicateReport {
  if (matches.length === 0) {
    return {
      isDuplicate: false,
      duplicateCount: 0,
      duplicates: [],
      message: 'No duplicates found',
    };
  }
  return {
    isDuplicate: true,
    duplicateCount: matches.length,
    duplicates: matches.slice(0, MAX_REPORTED_DUPLICATES),
    message: `Found ${matches.length} similar quote(s)`,
  };
}

export class QuoteDuplicateScanner {
  constructor(private readonly storage: IStorage) {}

  /**
   * Every stored quote that matches the candidate, in scan order.
   * Scan failures propagate; callers decide whether to fail open.
   */
  async findDuplicates(candidateQuote: string, candidateAuthor: string): Promise<DuplicateMatch[]> {
    const matches: DuplicateMatch[] = [];
    let scanned = 0;

    for await (const existing of scanQuotes(this.storage)) {
      scanned++;
      const verdict = classifyQuotePair(candidateQuote, candidateAuthor, existing.quote, existing.author);
      if (verdict.isMatch) {
        matches.push({
          id: existing.id,
          quote: existing.quote,
          author: existing.author,
          createdAt: existing.createdAt ?? '',
          matchReason: verdict.reason,
        });
      }
    }

    log.debug({ scanned, matches: matches.length }, 'duplicate scan finished');
    return matches;
  }

  /**
   * Duplicate check guarding quote creation. A failed scan is logged and
   * reported as no duplicates so the write is not blocked.
   */
  async checkBeforeCreate(candidateQuote: string, candidateAuthor: string): Promise<DuplicateReport> {
    const start = performance.now();
    try {
      const report = buildDuplicateReport(await this.findDuplicates(candidateQuote, candidateAuthor));
      this.record('create', report.isDuplicate ? 'duplicate' : 'clear', start);
      return report;
    } catch (error) {
      this.record('create', 'scan_failed', start);
      log.error(
        { err: toError(error), quotePreview: candidateQuote.substring(0, 50) },
        'duplicate scan failed, continuing without duplicate check'
      );
      return buildDuplicateReport([]);
    }
  }

  /**
   * Explicit duplicate check. Never blocks anything, but a failed scan
   * is raised so the caller can report it.
   */
  async check(candidateQuote: string, candidateAuthor: string): Promise<DuplicateReport> {
    const start = performance.now();
    try {
      const report = buildDuplicateReport(await this.findDuplicates(candidateQuote, candidateAuthor));
      this.record('check', report.isDuplicate ? 'duplicate' : 'clear', start);
      return report;
    } catch (error) {
      this.record('check', 'scan_failed', start);
      throw error;
    }
  }

  private record(site: DuplicateCheckSite, outcome: DuplicateCheckOutcome, start: number): void {
    metrics.recordDuplicateCheck(site, outcome, performance.now() - start);
  }
}
