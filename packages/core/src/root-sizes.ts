/**
 * Copyright 2026 Google LLC
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

// src/root-sizes.ts
import { GraphLinkError } from './errors.js';
import type { ParentMapping } from './parent-mapping.js';
import { findRootsFull } from './root-finder.js';
import type { VertexId } from './vertex.js';

/**
 * Vertex counts per live root, derived from a full-compression pass over
 * every vertex. Alongside it sits the roots snapshot (vertex to root at
 * build time), kept current on every weighted attach so the table never
 * needs a rescan.
 *
 * Invariant: the counts always sum to the number of vertices the table
 * was built for.
 */
export class RootSizeTable {
  private constructor(
    private readonly roots: VertexId[],
    private readonly sizes: Map<VertexId, number>,
  ) {}

  /** Compresses the whole mapping as a side effect. */
  static build(mapping: ParentMapping): RootSizeTable {
    const all = Array.from({ length: mapping.length }, (_, v) => v);
    const roots = findRootsFull(mapping, all);

    const counts = new Map<VertexId, number>();
    for (const root of roots) {
      counts.set(root, (counts.get(root) ?? 0) + 1);
    }
    const sizes = new Map(
      [...counts.entries()].sort(([a], [b]) => a - b),
    );
    return new RootSizeTable(roots, sizes);
  }

  /** The table only describes a mapping of the length it was built for. */
  isConsistentWith(mapping: ParentMapping): boolean {
    return this.roots.length === mapping.length;
  }

  sizeOf(root: VertexId): number {
    const size = this.sizes.get(root);
    if (size === undefined) {
      throw new GraphLinkError(`Vertex ${root} is not a root in the size table`);
    }
    return size;
  }

  /**
   * Fold `absorbed` into `into`: snapshot entries move over, the sizes
   * add up and `absorbed` leaves the table.
   */
  absorb(absorbed: VertexId, into: VertexId): number {
    const merged = this.sizeOf(into) + this.sizeOf(absorbed);
    for (let v = 0; v < this.roots.length; v++) {
      if (this.roots[v] === absorbed) this.roots[v] = into;
    }
    this.sizes.set(into, merged);
    this.sizes.delete(absorbed);
    return merged;
  }

  get rootCount(): number {
    return this.sizes.size;
  }

  toMap(): Map<VertexId, number> {
    return new Map(this.sizes);
  }

  snapshot(): VertexId[] {
    return [...this.roots];
  }
}
