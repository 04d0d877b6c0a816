/**
 * Detail Cursor
 *
 * Position within the sections of the last narration. Every method is
 * synchronous, so calls are linearized by the event loop.
 *
 * @module services/detail-cursor
 */

export type StepDirection = 1 | -1;

export interface DetailStep {
  /** Zero-based position of the selected section */
  index: number;
  total: number;
  text: string;
}

export class DetailCursor {
  private items: string[] = [];
  private index = -1;

  /**
   * Replace the sections and reset the position to "before the first"
   */
  load(sections: readonly string[]): void {
    this.items = [...sections];
    this.index = -1;
  }

  /**
   * Move one section forward or back, clamping at both ends.
   *
   * From the reset position, +1 lands on the first section and -1 on the
   * last one.
   *
   * @returns the selected section, or null when nothing is loaded
   */
  step(direction: StepDirection): DetailStep | null {
    const total = this.items.length;
    if (total === 0) {
      return null;
    }

    if (this.index === -1) {
      this.index = direction > 0 ? 0 : total - 1;
    } else if (direction > 0 && this.index < total - 1) {
      this.index += 1;
    } else if (direction < 0 && this.index > 0) {
      this.index -= 1;
    }

    return { index: this.index, total, text: this.items[this.index] };
  }

  sections(): readonly string[] {
    return this.items;
  }

  currentIndex(): number {
    return this.index;
  }
}
