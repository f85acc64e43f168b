/**
 * Progress reporting for a reconciliation pass.
 *
 * The tracker only counts and notifies; the listener decides what to do
 * with each snapshot. Counters only ever move forward.
 */

import type { ImportProgress, ProgressListener } from './types';

export interface ProgressCounts {
  totalLists: number;
  processedLists: number;
  totalItems: number;
  processedItems: number;
}

/** Fraction of lists + items processed, clamped to [0, 1]; 0 when there is nothing to do. */
export function computeOverallProgress(counts: ProgressCounts): number {
  const total = counts.totalLists + counts.totalItems;
  if (total <= 0) return 0;
  const ratio = (counts.processedLists + counts.processedItems) / total;
  return Math.min(1, Math.max(0, ratio));
}

export function toProgressPercentage(overallProgress: number): number {
  return Math.round(overallProgress * 100);
}

export function buildProgress(counts: ProgressCounts, currentOperation: string): ImportProgress {
  const overallProgress = computeOverallProgress(counts);
  return {
    ...counts,
    currentOperation,
    overallProgress,
    progressPercentage: toProgressPercentage(overallProgress),
  };
}

export class ImportProgressTracker {
  private processedLists = 0;
  private processedItems = 0;

  constructor(
    private readonly totalLists: number,
    private readonly totalItems: number,
    private readonly listener?: ProgressListener,
  ) {}

  snapshot(currentOperation = ''): ImportProgress {
    return buildProgress(
      {
        totalLists: this.totalLists,
        processedLists: this.processedLists,
        totalItems: this.totalItems,
        processedItems: this.processedItems,
      },
      currentOperation,
    );
  }

  /** Emit the current counters with a new operation label. */
  report(currentOperation: string): void {
    this.listener?.(this.snapshot(currentOperation));
  }

  itemProcessed(): void {
    this.processedItems = Math.min(this.totalItems, this.processedItems + 1);
    this.report(`Processing item ${this.processedItems} of ${this.totalItems}`);
  }

  /** Count items that were skipped wholesale (their list was rejected). */
  itemsSkipped(count: number): void {
    if (count <= 0) return;
    this.processedItems = Math.min(this.totalItems, this.processedItems + count);
  }

  listProcessed(): void {
    this.processedLists = Math.min(this.totalLists, this.processedLists + 1);
    this.report(`Processing list ${this.processedLists} of ${this.totalLists}`);
  }
}
