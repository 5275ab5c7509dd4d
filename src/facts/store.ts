/**
 * In-memory Fact Store
 *
 * Holds at most one fact per (key, category). Writing a fact whose
 * (key, category) already exists replaces it in place, so "first match"
 * lookups always follow insertion order.
 */

import { nanoid } from 'nanoid';
import { FactInputSchema, type Fact, type FactFilter, type FactStore, type FactValue } from './types.js';
import { FactValidationError } from '../core/errors.js';

export function createFactId(): string {
  return `fact_${nanoid(10)}`;
}

/**
 * Validate a raw fact document and normalise it into a Fact.
 */
export function parseFact(input: unknown): Fact {
  const result = FactInputSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new FactValidationError(`Invalid fact: ${issues.join('; ')}`, issues);
  }

  const doc = result.data;
  return {
    id: doc.id ?? createFactId(),
    key: doc.key,
    category: doc.category,
    value: doc.value,
    unit: doc.unit,
    source: doc.source,
    sourceType: doc.sourceType ?? doc.source_type ?? (doc.value === null ? 'Missing' : 'Unknown'),
    confidence: doc.confidence,
    notes: doc.notes,
  };
}

export function parseFacts(input: unknown): Fact[] {
  if (!Array.isArray(input)) {
    throw new FactValidationError('Fact file must contain a JSON array of facts', ['(root): expected array']);
  }
  return input.map((item, index) => {
    try {
      return parseFact(item);
    } catch (error) {
      if (error instanceof FactValidationError) {
        throw new FactValidationError(
          `Invalid fact at index ${index}: ${error.issues.join('; ')}`,
          error.issues.map(issue => `[${index}] ${issue}`)
        );
      }
      throw error;
    }
  });
}

export class InMemoryFactStore implements FactStore {
  private facts: Fact[] = [];

  constructor(facts: Fact[] = []) {
    for (const fact of facts) {
      this.upsert(fact);
    }
  }

  static fromDocuments(documents: unknown[]): InMemoryFactStore {
    return new InMemoryFactStore(parseFacts(documents));
  }

  get size(): number {
    return this.facts.length;
  }

  getFacts(filter: FactFilter = {}): Fact[] {
    let filtered = this.facts;
    if (filter.category) {
      filtered = filtered.filter(f => f.category === filter.category);
    }
    if (filter.key) {
      filtered = filtered.filter(f => f.key === filter.key);
    }
    return [...filtered];
  }

  getFactValue(key: string, defaultValue: FactValue = null): FactValue {
    const fact = this.facts.find(f => f.key === key);
    return fact ? fact.value : defaultValue;
  }

  getAllKeys(): string[] {
    const keys: string[] = [];
    const seen = new Set<string>();
    for (const fact of this.facts) {
      if (fact.key && !seen.has(fact.key)) {
        seen.add(fact.key);
        keys.push(fact.key);
      }
    }
    return keys;
  }

  upsert(fact: Fact): Fact {
    const index = this.facts.findIndex(f => f.key === fact.key && f.category === fact.category);
    if (index >= 0) {
      const merged = { ...fact, id: this.facts[index].id };
      this.facts[index] = merged;
      return merged;
    }
    this.facts.push(fact);
    return fact;
  }

  remove(key: string, category?: string): number {
    const before = this.facts.length;
    this.facts = this.facts.filter(f => !(f.key === key && (category === undefined || f.category === category)));
    return before - this.facts.length;
  }

  clear(): void {
    this.facts = [];
  }

  /**
   * Frozen copy handed to the engine. Later writes to this store do not
   * reach the snapshot.
   */
  snapshot(): FactStore {
    const frozen = this.facts.map(fact => Object.freeze({ ...fact }));
    return new InMemoryFactStore(frozen);
  }
}
