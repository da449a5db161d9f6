/**
 * Unit Table
 *
 * Index of name-file entries by unit number. Iteration follows insertion
 * order, which for a parsed table is the order lines appear in the name file.
 */

import { ValidationError } from '@gwmodel/utils';
import type { UnitTableEntry } from './types/index.js';

export class UnitTable implements Iterable<UnitTableEntry> {
  private readonly entries = new Map<number, UnitTableEntry>();

  constructor(entries: Iterable<UnitTableEntry> = []) {
    for (const entry of entries) {
      this.add(entry);
    }
  }

  /**
   * Add an entry
   *
   * @throws ValidationError if the unit is not a positive integer or is already taken
   */
  add(entry: UnitTableEntry): void {
    if (!Number.isInteger(entry.unit) || entry.unit <= 0) {
      throw new ValidationError(`Unit number must be a positive integer, got ${entry.unit}`, {
        unit: entry.unit,
        filename: entry.filename,
      });
    }
    const existing = this.entries.get(entry.unit);
    if (existing) {
      throw new ValidationError(
        `Unit ${entry.unit} is already assigned to '${existing.filename}'`,
        { unit: entry.unit, filename: entry.filename, existing: existing.filename }
      );
    }
    this.entries.set(entry.unit, { ...entry, filetype: entry.filetype.toUpperCase() });
  }

  get(unit: number): UnitTableEntry | undefined {
    return this.entries.get(unit);
  }

  has(unit: number): boolean {
    return this.entries.has(unit);
  }

  /**
   * Remove an entry, returning it if it existed
   */
  remove(unit: number): UnitTableEntry | undefined {
    const entry = this.entries.get(unit);
    this.entries.delete(unit);
    return entry;
  }

  findByFilename(filename: string): UnitTableEntry | undefined {
    for (const entry of this.entries.values()) {
      if (entry.filename === filename) {
        return entry;
      }
    }
    return undefined;
  }

  /**
   * First entry, in table order, carrying the filetype
   */
  findByFiletype(filetype: string): UnitTableEntry | undefined {
    const tag = filetype.toUpperCase();
    for (const entry of this.entries.values()) {
      if (entry.filetype === tag) {
        return entry;
      }
    }
    return undefined;
  }

  /**
   * Distinct filetypes in table order
   */
  filetypes(): string[] {
    return Array.from(new Set(Array.from(this.entries.values(), (entry) => entry.filetype)));
  }

  list(): UnitTableEntry[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }

  clone(): UnitTable {
    return new UnitTable(this.list());
  }

  [Symbol.iterator](): Iterator<UnitTableEntry> {
    return this.entries.values();
  }
}
