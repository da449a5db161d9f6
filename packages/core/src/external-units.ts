/**
 * External Unit Allocator
 *
 * Hands out unit numbers for external data files. Units at or below the
 * start value are reserved for packages.
 */

export const EXTERNAL_UNIT_START = 1000;

export class ExternalUnitAllocator {
  private last: number;

  constructor(start: number = EXTERNAL_UNIT_START) {
    this.last = start;
  }

  /**
   * Next unit number, strictly greater than every earlier one
   */
  allocate(): number {
    this.last += 1;
    return this.last;
  }

  /**
   * Move past a unit assigned elsewhere so it is never handed out
   */
  reserve(unit: number): void {
    if (unit > this.last) {
      this.last = unit;
    }
  }

  /**
   * Most recently allocated unit, or the start value before the first allocation
   */
  peek(): number {
    return this.last;
  }
}
