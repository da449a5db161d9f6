/**
 * Parameter Substitution Context
 *
 * Named values (PVAL), zone arrays (ZONE) and multiplier arrays (MULT)
 * that later packages refer to by name. Names are case-insensitive.
 */

/**
 * Where the values of a named array come from
 */
export type ArraySource =
  | { kind: 'constant'; value: number }
  | { kind: 'internal'; multiplier: number; values: number[] }
  | { kind: 'external'; unit: number; multiplier: number }
  | { kind: 'open-close'; filename: string; multiplier: number }
  | { kind: 'function'; expression: string };

export class ParameterContext {
  private readonly values = new Map<string, number>();
  private readonly zones = new Map<string, ArraySource>();
  private readonly multipliers = new Map<string, ArraySource>();

  setValue(name: string, value: number): void {
    this.values.set(name.toUpperCase(), value);
  }

  getValue(name: string): number | undefined {
    return this.values.get(name.toUpperCase());
  }

  setZone(name: string, source: ArraySource): void {
    this.zones.set(name.toUpperCase(), source);
  }

  getZone(name: string): ArraySource | undefined {
    return this.zones.get(name.toUpperCase());
  }

  setMultiplier(name: string, source: ArraySource): void {
    this.multipliers.set(name.toUpperCase(), source);
  }

  getMultiplier(name: string): ArraySource | undefined {
    return this.multipliers.get(name.toUpperCase());
  }

  valueNames(): string[] {
    return Array.from(this.values.keys());
  }

  zoneNames(): string[] {
    return Array.from(this.zones.keys());
  }

  multiplierNames(): string[] {
    return Array.from(this.multipliers.keys());
  }
}
