/**
 * Restore progress derived from merge output
 */

import { type MergeLine, parseMergeLine } from "./merger.js";

export type RestoreProgressListener = (percent: number, processed: number) => void;

/**
 * Maps merge lines to percentages of the files found before the merge began.
 *
 * A listener call happens only when the percentage changes. An empty staging
 * tree counts as 100 files so the math never divides by zero.
 */
export class RestoreProgress {
  readonly total: number;
  private processed = 0;
  private lastPercent: number | null = null;

  constructor(
    fileCount: number,
    private readonly listener: RestoreProgressListener,
  ) {
    this.total = fileCount === 0 ? 100 : fileCount;
  }

  get processedCount(): number {
    return this.processed;
  }

  get percent(): number {
    return Math.min(100, Math.floor((this.processed / this.total) * 100));
  }

  start(): void {
    this.emit(0);
  }

  /**
   * Feed one merge line. Returns the parsed line, or null for lines that do
   * not describe a file.
   */
  observe(line: string): MergeLine | null {
    const parsed = parseMergeLine(line);
    if (!parsed) return null;

    this.processed++;
    this.emit(this.percent);
    return parsed;
  }

  finish(): void {
    this.emit(100);
  }

  private emit(percent: number): void {
    if (percent === this.lastPercent) return;
    this.lastPercent = percent;
    this.listener(percent, this.processed);
  }
}
