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

// src/disjoint-set.ts
import { InvalidArgumentError } from './errors.js';
import type { GraphEmitter } from './events.js';
import { ParentMapping } from './parent-mapping.js';
import { quickUnion, type UnionOptions } from './quick-union.js';
import { findRootsCompressed, findRootsPlain } from './root-finder.js';
import { RootSizeTable } from './root-sizes.js';
import {
  parseCompressionMode,
  parseVertexId,
  toVertexBatch,
  type CompressionMode,
  type VertexId,
  type VertexInput,
} from './vertex.js';
import { weightedUnion } from './weighted-union.js';

export interface DisjointSetOptions {
  /** Receives union, rebuild and growth events. */
  emit?: GraphEmitter;
}

export type FindRootOptions = UnionOptions;

/**
 * Incremental union-find over vertices `0..size-1`.
 *
 * Two union entry points are offered on purpose:
 * - {@link DisjointSet.union} takes ordered batches and never balances.
 * - {@link DisjointSet.weightedUnion} takes exactly one pair of vertex ids
 *   and keeps trees shallow by size. Its bookkeeping is per pair, so it
 *   rejects batches.
 *
 * Lookups that compress (`findRoot`, `findRootCompressed`, and both
 * unions) rewrite parent links of the vertices they visit. Use
 * {@link DisjointSet.findRootPlain} or {@link DisjointSet.connected} for a
 * read-only query.
 */
export class DisjointSet {
  private readonly mapping: ParentMapping;
  private readonly emit?: GraphEmitter;
  private sizes?: RootSizeTable;

  constructor(parents: readonly number[], options: DisjointSetOptions = {}) {
    this.mapping = new ParentMapping(parents);
    this.emit = options.emit;
  }

  static identity(size: number, options?: DisjointSetOptions): DisjointSet {
    return new DisjointSet(
      Array.from({ length: size }, (_, v) => v),
      options,
    );
  }

  get size(): number {
    return this.mapping.length;
  }

  /** A copy of the current parent array. */
  parents(): VertexId[] {
    return this.mapping.toArray();
  }

  /**
   * Pure lookup: follows parent links and never mutates.
   */
  findRootPlain(id: VertexId): VertexId;
  findRootPlain(ids: readonly VertexId[]): VertexId[];
  findRootPlain(ids: VertexInput): VertexId | VertexId[] {
    const roots = findRootsPlain(this.mapping, this.batch(ids));
    return typeof ids === 'number' ? roots[0] : roots;
  }

  /**
   * Lookup that rewrites the parent links of every visited vertex
   * according to `mode`.
   */
  findRootCompressed(id: VertexId, mode?: CompressionMode): VertexId;
  findRootCompressed(
    ids: readonly VertexId[],
    mode?: CompressionMode,
  ): VertexId[];
  findRootCompressed(
    ids: VertexInput,
    mode: CompressionMode = 'path_halving',
  ): VertexId | VertexId[] {
    const roots = findRootsCompressed(
      this.mapping,
      this.batch(ids),
      parseCompressionMode(mode),
    );
    return typeof ids === 'number' ? roots[0] : roots;
  }

  /**
   * Find roots and point each queried vertex directly at its root.
   * With `compress: false` this is the pure {@link findRootPlain}.
   */
  findRoot(id: VertexId, options?: FindRootOptions): VertexId;
  findRoot(ids: readonly VertexId[], options?: FindRootOptions): VertexId[];
  findRoot(
    ids: VertexInput,
    options: FindRootOptions = {},
  ): VertexId | VertexId[] {
    const batch = this.batch(ids);
    const { compress, mode } = this.resolve(options);
    let roots: VertexId[];
    if (compress) {
      roots = findRootsCompressed(this.mapping, batch, mode);
      batch.forEach((v, k) => this.mapping.set(v, roots[k]));
    } else {
      roots = findRootsPlain(this.mapping, batch);
    }
    return typeof ids === 'number' ? roots[0] : roots;
  }

  /** Read-only connectivity test. */
  connected(a: VertexId, b: VertexId): boolean {
    return this.findRootPlain(a) === this.findRootPlain(b);
  }

  /**
   * Batched quick union: the root of each `minor[k]` is attached under
   * the root of `main[k]`. Nothing is written only when every pair is
   * already joined.
   */
  union(minor: VertexInput, main: VertexInput, options: UnionOptions = {}): void {
    const minorBatch = this.batch(minor);
    const mainBatch = this.batch(main);
    if (minorBatch.length !== mainBatch.length) {
      throw new InvalidArgumentError(
        `Union batches differ in length: ${minorBatch.length} minor vs ${mainBatch.length} main`,
      );
    }

    const pairs = quickUnion(
      this.mapping,
      minorBatch,
      mainBatch,
      this.resolve(options),
    );
    if (pairs === 0) {
      this.emit?.({ type: 'union:skipped', kind: 'quick' });
      return;
    }
    this.emit?.({ type: 'union:merged', kind: 'quick', pairs });
  }

  /**
   * Size-weighted union of exactly one pair. The smaller tree goes under
   * the larger root; on a tie `minor`'s root goes under `main`'s.
   *
   * @throws InvalidArgumentError when either id is not a single integer.
   */
  weightedUnion(
    minor: VertexId,
    main: VertexId,
    options: UnionOptions = {},
  ): void {
    const i = parseVertexId(minor, this.size);
    const j = parseVertexId(main, this.size);

    const attach = weightedUnion(
      this.mapping,
      i,
      j,
      this.resolve(options),
      () => this.ensureSizes(),
    );
    if (!attach) {
      this.emit?.({ type: 'union:skipped', kind: 'weighted' });
      return;
    }
    this.emit?.({ type: 'union:merged', kind: 'weighted', ...attach });
  }

  /**
   * Vertex counts per root, or `undefined` until a weighted union has
   * materialized them. Quick unions leave the counts untouched, so after
   * one they describe the roots as the weighted unions last saw them.
   */
  rootSizes(): Map<VertexId, number> | undefined {
    return this.sizes?.toMap();
  }

  /** Vertex to root as of the last size-table build, kept current by weighted unions. */
  rootsSnapshot(): VertexId[] | undefined {
    return this.sizes?.snapshot();
  }

  /**
   * Append `count` self-rooted vertices. Existing size bookkeeping is left
   * as is and rebuilt by the next weighted union.
   */
  addVertices(count: number): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidArgumentError(
        `Vertex count must be a non-negative integer, received ${count}`,
      );
    }
    this.mapping.grow(count);
    this.emit?.({ type: 'vertices:added', count, total: this.size });
  }

  /**
   * Vertices grouped by root. Groups are ordered by their smallest vertex
   * and members ascend.
   */
  groups(): VertexId[][] {
    const grouped = new Map<VertexId, VertexId[]>();
    const all = Array.from({ length: this.size }, (_, v) => v);
    findRootsPlain(this.mapping, all).forEach((root, v) => {
      const members = grouped.get(root);
      if (members) {
        members.push(v);
      } else {
        grouped.set(root, [v]);
      }
    });
    return [...grouped.values()];
  }

  componentCount(): number {
    let roots = 0;
    for (let v = 0; v < this.size; v++) {
      if (this.mapping.isRoot(v)) roots++;
    }
    return roots;
  }

  private ensureSizes(): RootSizeTable {
    if (this.sizes && this.sizes.isConsistentWith(this.mapping)) {
      return this.sizes;
    }
    const reason = this.sizes ? 'length-mismatch' : 'absent';
    this.sizes = RootSizeTable.build(this.mapping);
    this.emit?.({ type: 'sizes:rebuilt', reason, roots: this.sizes.rootCount });
    return this.sizes;
  }

  private batch(ids: VertexInput): VertexId[] {
    return toVertexBatch(ids, this.size);
  }

  private resolve(options: UnionOptions): Required<UnionOptions> {
    return {
      compress: options.compress ?? true,
      mode: parseCompressionMode(options.mode ?? 'path_halving'),
    };
  }
}
