import type { Reference } from '../types/index.js';

const KEY_SEPARATOR = '\u0000';

export function createReference(name: string, augmentText = ''): Reference {
  return Object.freeze({ name, augmentText });
}

// Same name (any case) with different raw augment text stays distinct.
export function referenceKey(reference: Reference): string {
  return `${reference.name.toLowerCase()}${KEY_SEPARATOR}${reference.augmentText}`;
}

export class ReferenceSet implements Iterable<Reference> {
  private readonly entries = new Map<string, Reference>();

  constructor(references: Iterable<Reference> = []) {
    for (const reference of references) this.add(reference);
  }

  add(reference: Reference): boolean {
    const key = referenceKey(reference);
    if (this.entries.has(key)) return false;
    this.entries.set(key, reference);
    return true;
  }

  addAll(references: Iterable<Reference>): this {
    for (const reference of references) this.add(reference);
    return this;
  }

  has(reference: Reference): boolean {
    return this.entries.has(referenceKey(reference));
  }

  get size(): number {
    return this.entries.size;
  }

  get augmentedCount(): number {
    let count = 0;
    for (const reference of this.entries.values()) {
      if (reference.augmentText) count++;
    }
    return count;
  }

  [Symbol.iterator](): IterableIterator<Reference> {
    return this.entries.values();
  }
}
