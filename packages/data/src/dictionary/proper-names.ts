// corrector/data/proper-names - Names and surnames shared by every language

import fs from 'fs';
import { DictionaryLoadError } from './errors.js';

export class ProperNames {
  private readonly names = new Set<string>();
  private readonly lowered = new Set<string>();

  constructor(names: Iterable<string> = []) {
    for (const name of names) this.add(name);
  }

  static parse(content: string): ProperNames {
    const names = content
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line !== '' && !line.startsWith('#'));
    return new ProperNames(names);
  }

  static loadFile(path: string): ProperNames {
    try {
      return ProperNames.parse(fs.readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new DictionaryLoadError(path, error);
    }
  }

  get size(): number {
    return this.names.size;
  }

  add(name: string): void {
    const trimmed = name.trim();
    if (trimmed === '') return;
    this.names.add(trimmed);
    this.lowered.add(trimmed.toLowerCase());
  }

  /** Exact spelling as listed. */
  has(word: string): boolean {
    return this.names.has(word);
  }

  hasIgnoreCase(word: string): boolean {
    return this.lowered.has(word.toLowerCase());
  }

  /** "Madrid" and "MADRID" match a listed "Madrid"; "madrid" does not. */
  isProperName(word: string): boolean {
    return /^\p{Lu}/u.test(word) && this.lowered.has(word.toLowerCase());
  }
}
