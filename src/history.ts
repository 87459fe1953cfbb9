// src/history.ts - Bounded evaluation history
import * as fs from 'fs/promises';
import { formatNumber } from './format';

export const DEFAULT_HISTORY_SIZE = 50;

export interface HistoryEntry {
  expression: string;
  ok: boolean;
  value?: number;
  error?: string;
}

function index(i: number): string {
  return String(i + 1).padStart(2, '0');
}

export class History {
  private items: HistoryEntry[] = [];

  constructor(readonly capacity: number = DEFAULT_HISTORY_SIZE) {}

  get entries(): readonly HistoryEntry[] {
    return this.items;
  }

  addSuccess(expression: string, value: number): void {
    this.push({ expression, ok: true, value });
  }

  addFailure(expression: string, error: string): void {
    this.push({ expression, ok: false, error });
  }

  clear(): void {
    this.items = [];
  }

  /**
   * Listing for display, oldest first.
   */
  format(): string[] {
    const lines = ['History (newest last):'];
    this.items.forEach((item, i) => {
      const outcome = item.ok ? formatNumber(item.value ?? 0) : `ERROR: ${item.error ?? ''}`;
      lines.push(`  [${index(i)}] ${item.expression}  =>  ${outcome}`);
    });
    return lines;
  }

  serialize(): string {
    return this.items
      .map((item, i) => {
        const outcome = item.ok ? formatNumber(item.value ?? 0) : `ERROR(${item.error ?? ''})`;
        return `[${index(i)}] ${item.expression} = ${outcome}\n`;
      })
      .join('');
  }

  async save(file: string): Promise<void> {
    await fs.writeFile(file, this.serialize(), 'utf-8');
  }

  private push(entry: HistoryEntry): void {
    if (this.items.length >= this.capacity) {
      this.items.shift();
    }
    this.items.push(entry);
  }
}
