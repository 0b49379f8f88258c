import { computeAggregate } from './aggregation';
import type { AggregateEntry } from './aggregation';
import { derive, deriveFromAmounts } from './derivation';
import type { DerivedValues } from './derivation';
import {
  InvalidInputError,
  createMacroEntry,
  overflowingField,
  readQuantity,
  scaledMagnitude,
  withQuantity,
  writeQuantity,
} from './macroEntry';
import type { EntryInit, MacroEntry, QuantityField } from './macroEntry';
import { COLLECTION_KEY, RecomputeController, entryKeys, fieldKey } from './recompute';
import type { ComputedNode } from './recompute';
import { createLogger } from './logger';
import type { Logger } from './logger';

export interface StoreSnapshot {
  version: number;
  recipeName: string;
  entries: readonly Readonly<MacroEntry>[];
}

export interface EntryStoreOptions {
  recipeName?: string;
  entries?: readonly EntryInit[];
  logger?: Logger;
}

type Listener = () => void;

interface EntryRecord {
  entry: MacroEntry;
  derived: ComputedNode<DerivedValues>;
}

/**
 * The single owner of the recipe's entries. Every write goes through here, and every
 * write invalidates the derived values that read the changed field before any
 * subscriber is told about it.
 */
export class EntryStore {
  private readonly records = new Map<string, EntryRecord>();
  private readonly listeners = new Set<Listener>();
  private readonly controller: RecomputeController;
  private readonly aggregateTotals: ComputedNode<Readonly<AggregateEntry>>;
  private readonly aggregateDerived: ComputedNode<DerivedValues>;
  private readonly logger: Logger;
  private nextId = 1;
  private version = 0;
  private recipeName: string;
  private snapshot: StoreSnapshot | null = null;

  constructor(options: EntryStoreOptions = {}) {
    this.logger = options.logger ?? createLogger('entry-store');
    this.controller = new RecomputeController((name) => this.logger.debug(`recomputed ${name}`));
    this.recipeName = options.recipeName ?? '';

    this.aggregateTotals = this.controller.computed('aggregate', [COLLECTION_KEY], () =>
      computeAggregate(this.currentEntries())
    );
    // Derived from the cached totals so the two never disagree.
    this.aggregateDerived = this.controller.computed('aggregate-derived', [COLLECTION_KEY], () =>
      deriveFromAmounts(this.aggregateTotals.read())
    );

    for (const initial of options.entries ?? []) {
      this.insert(initial);
    }
  }

  get recomputeCount(): number {
    return this.controller.recomputeCount;
  }

  addEntry(initial: EntryInit = {}): string {
    const id = this.insert(initial);
    this.logger.debug(`added ${id}`);
    this.commit();
    return id;
  }

  removeEntry(id: string): void {
    const record = this.records.get(id);
    if (!record) {
      this.logger.debug(`remove ignored, no entry ${id}`);
      return;
    }

    this.records.delete(id);
    this.controller.release(record.derived);
    const keys = entryKeys(id);
    this.controller.undepend(this.aggregateTotals, keys);
    this.controller.undepend(this.aggregateDerived, keys);
    this.controller.notify(COLLECTION_KEY);
    this.logger.debug(`removed ${id}`);
    this.commit();
  }

  /**
   * Throws InvalidInputError for a negative or non-finite value, or one that would push the
   * recipe totals past the largest representable number; the entry is left as it was.
   */
  updateField(id: string, field: QuantityField, value: number): void {
    const record = this.records.get(id);
    if (!record) {
      this.logger.debug(`update ignored, no entry ${id}`);
      return;
    }
    this.assertTotalsFit(withQuantity(record.entry, field, value), field);
    if (!writeQuantity(record.entry, field, value)) {
      return;
    }
    this.controller.notify(fieldKey(id, field));
    this.logger.debug(`updated ${id}.${field}`, value);
    this.commit();
  }

  updateLabel(id: string, label: string): void {
    const record = this.records.get(id);
    if (!record || record.entry.label === label) return;
    record.entry.label = label;
    this.commit();
  }

  setRecipeName(name: string): void {
    if (this.recipeName === name) return;
    this.recipeName = name;
    this.commit();
  }

  getRecipeName(): string {
    return this.recipeName;
  }

  listEntries(): readonly Readonly<MacroEntry>[] {
    return this.getSnapshot().entries;
  }

  getEntry(id: string): Readonly<MacroEntry> | undefined {
    return this.listEntries().find((entry) => entry.id === id);
  }

  getDerived(id: string): DerivedValues | undefined {
    return this.records.get(id)?.derived.read();
  }

  getAggregate(): Readonly<AggregateEntry> {
    return this.aggregateTotals.read();
  }

  getAggregateDerived(): DerivedValues {
    return this.aggregateDerived.read();
  }

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  // Same object until the next mutation, as useSyncExternalStore requires.
  getSnapshot = (): StoreSnapshot => {
    if (!this.snapshot) {
      this.snapshot = Object.freeze({
        version: this.version,
        recipeName: this.recipeName,
        entries: Object.freeze(this.currentEntries().map((entry) => Object.freeze({ ...entry }))),
      });
    }
    return this.snapshot;
  };

  private insert(initial: EntryInit): string {
    const id = `entry-${this.nextId}`;
    const entry = createMacroEntry(id, initial);
    this.assertTotalsFit(entry);
    this.nextId += 1;

    const keys = entryKeys(id);
    const derived = this.controller.computed(id, keys, () => derive(entry));
    this.records.set(id, { entry, derived });
    this.controller.depend(this.aggregateTotals, keys);
    this.controller.depend(this.aggregateDerived, keys);
    this.controller.notify(COLLECTION_KEY);
    return id;
  }

  // Blames `field` when given, otherwise the candidate's first overflowing macro.
  private assertTotalsFit(candidate: Readonly<MacroEntry>, field?: QuantityField): void {
    let base = 0;
    this.records.forEach((record) => {
      if (record.entry.id !== candidate.id) base += scaledMagnitude(record.entry);
    });
    const overflow = overflowingField(candidate, base);
    if (overflow === undefined) return;
    const blamed = field ?? overflow;
    throw new InvalidInputError(blamed, readQuantity(candidate, blamed), 'not-finite');
  }

  private currentEntries(): MacroEntry[] {
    return Array.from(this.records.values(), (record) => record.entry);
  }

  private commit(): void {
    this.version += 1;
    this.snapshot = null;
    this.listeners.forEach((listener) => listener());
  }
}
