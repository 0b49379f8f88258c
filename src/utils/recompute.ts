import { QUANTITY_FIELDS } from './macroEntry';
import type { QuantityField } from './macroEntry';

export type SourceKey = string;

export const COLLECTION_KEY: SourceKey = 'collection';

export function fieldKey(entryId: string, field: QuantityField): SourceKey {
  return `${entryId}:${field}`;
}

export function entryKeys(entryId: string): SourceKey[] {
  return QUANTITY_FIELDS.map((field) => fieldKey(entryId, field));
}

/**
 * A lazily computed value. It is marked dirty when a source it reads changes and
 * recomputes on the next read.
 */
export class ComputedNode<T> {
  private dirty = true;
  private cached: { value: T } | null = null;

  constructor(
    readonly name: string,
    private readonly compute: () => T,
    private readonly onRecompute: (name: string) => void
  ) {}

  get isDirty(): boolean {
    return this.dirty;
  }

  invalidate(): void {
    this.dirty = true;
  }

  read(): T {
    if (this.dirty || this.cached === null) {
      this.cached = { value: this.compute() };
      this.dirty = false;
      this.onRecompute(this.name);
    }
    return this.cached.value;
  }
}

type AnyNode = ComputedNode<unknown>;

/**
 * Tracks which computed nodes read which source keys, and marks exactly those
 * nodes dirty when a key changes. Everything runs synchronously on the caller.
 */
export class RecomputeController {
  private readonly dependents = new Map<SourceKey, Set<AnyNode>>();
  private readonly sourcesOf = new Map<AnyNode, Set<SourceKey>>();
  private recomputations = 0;

  constructor(private readonly onRecompute?: (name: string) => void) {}

  /** Total number of node recomputations since construction. */
  get recomputeCount(): number {
    return this.recomputations;
  }

  computed<T>(name: string, sources: readonly SourceKey[], compute: () => T): ComputedNode<T> {
    const node = new ComputedNode(name, compute, (nodeName) => {
      this.recomputations += 1;
      this.onRecompute?.(nodeName);
    });
    this.depend(node, sources);
    return node;
  }

  depend(node: AnyNode, sources: readonly SourceKey[]): void {
    let known = this.sourcesOf.get(node);
    if (!known) {
      known = new Set();
      this.sourcesOf.set(node, known);
    }
    for (const key of sources) {
      known.add(key);
      let nodes = this.dependents.get(key);
      if (!nodes) {
        nodes = new Set();
        this.dependents.set(key, nodes);
      }
      nodes.add(node);
    }
  }

  undepend(node: AnyNode, sources: readonly SourceKey[]): void {
    const known = this.sourcesOf.get(node);
    for (const key of sources) {
      known?.delete(key);
      const nodes = this.dependents.get(key);
      if (!nodes) continue;
      nodes.delete(node);
      if (nodes.size === 0) this.dependents.delete(key);
    }
  }

  /** Drop a node and every edge pointing at it. */
  release(node: AnyNode): void {
    const known = this.sourcesOf.get(node);
    if (known) this.undepend(node, [...known]);
    this.sourcesOf.delete(node);
  }

  /** Mark every node that reads `key` dirty. Returns how many nodes were affected. */
  notify(key: SourceKey): number {
    const nodes = this.dependents.get(key);
    if (!nodes) return 0;
    nodes.forEach((node) => node.invalidate());
    return nodes.size;
  }

  dependentCount(key: SourceKey): number {
    return this.dependents.get(key)?.size ?? 0;
  }
}
