import type { LanguageCode } from './languages';
import { foldCase } from './text';

export class Deduplicator {
  private readonly seen = new Set<string>();

  static keyOf(text: string, language: LanguageCode): string {
    return `${language}:${foldCase(text)}`;
  }

  isNew(key: string): boolean {
    return !this.seen.has(key);
  }

  remember(key: string): void {
    this.seen.add(key);
  }

  get size(): number {
    return this.seen.size;
  }
}
