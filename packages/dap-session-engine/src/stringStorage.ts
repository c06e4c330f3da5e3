import type { StringCloner } from './marshal/schema';

/**
 * Append-only intern pool. Each distinct string is stored once and the stored
 * copy is handed back for every later equal lookup.
 */
export class StringStorage implements StringCloner {
  private readonly strings = new Map<string, string>();

  public getAndPut(value: string): string {
    const existing = this.strings.get(value);
    if (existing !== undefined) return existing;
    this.strings.set(value, value);
    return value;
  }

  public has(value: string): boolean {
    return this.strings.has(value);
  }

  public get size(): number {
    return this.strings.size;
  }

  public cloneString(value: string): string {
    return this.getAndPut(value);
  }
}
