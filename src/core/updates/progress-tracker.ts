export const INDETERMINATE = 'indeterminate' as const;

export type Percentage = number | typeof INDETERMINATE;

/** Sub-range of the overall 0..100 percentage a stage reports into. */
export interface StageRange {
  start: number;
  end: number;
}

export const FULL_RANGE: StageRange = { start: 0, end: 100 };

/**
 * Normalize a raw daemon percentage. Daemons report "unknown" either by
 * omitting the value or with the out-of-range sentinel 101.
 */
export function normalizePercentage(raw: number | undefined): Percentage {
  if (raw === undefined || !Number.isFinite(raw) || raw > 100) {
    return INDETERMINATE;
  }
  return Math.max(0, Math.round(raw));
}

/**
 * Map a stage's own 0..100 into its slice of the overall progress.
 */
export function remapStageProgress(value: Percentage, range: StageRange): Percentage {
  if (value === INDETERMINATE) {
    return INDETERMINATE;
  }
  return Math.round(range.start + (value / 100) * (range.end - range.start));
}

/**
 * Holds the current percentage and status line. No weighting happens here;
 * stage remapping is applied by the caller before values are forwarded.
 */
export class ProgressTracker {
  private percentage: Percentage = 0;
  private status: string;

  constructor(private readonly idleStatus: string = 'Idle') {
    this.status = idleStatus;
  }

  onStageProgress(value: Percentage): void {
    this.percentage = value === INDETERMINATE ? INDETERMINATE : Math.min(100, Math.max(0, Math.round(value)));
  }

  onStatus(text: string): void {
    this.status = text;
  }

  effectivePercentage(): Percentage {
    return this.percentage;
  }

  statusText(): string {
    return this.status;
  }

  reset(status: string = this.idleStatus): void {
    this.percentage = 0;
    this.status = status;
  }
}
