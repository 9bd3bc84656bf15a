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

// src/parent-mapping.ts
import { InvalidForestError, InvalidArgumentError } from './errors.js';
import { assertInRange, ParentArraySchema, type VertexId } from './vertex.js';

const UNSEEN = 0;
const ON_PATH = 1;
const SETTLED = 2;

/**
 * Array-backed forest: index is the vertex, value is its direct parent.
 * Roots are self-parented.
 *
 * The mapping is owned by exactly one engine instance and only mutated
 * through that instance's operations.
 */
export class ParentMapping {
  private readonly parent: number[];

  constructor(parents: readonly number[]) {
    const parsed = ParentArraySchema.safeParse(parents);
    if (!parsed.success) {
      throw new InvalidArgumentError(
        'Parent array must contain integers only',
      );
    }
    this.parent = parsed.data;
    for (const p of this.parent) {
      assertInRange(p, this.parent.length);
    }
    assertForest(this.parent);
  }

  static identity(size: number): ParentMapping {
    return new ParentMapping(Array.from({ length: size }, (_, v) => v));
  }

  get length(): number {
    return this.parent.length;
  }

  get(vertex: VertexId): VertexId {
    return this.parent[vertex];
  }

  set(vertex: VertexId, parent: VertexId): void {
    this.parent[vertex] = parent;
  }

  isRoot(vertex: VertexId): boolean {
    return this.parent[vertex] === vertex;
  }

  /** Append `count` self-parented vertices. */
  grow(count: number): void {
    const start = this.parent.length;
    for (let v = start; v < start + count; v++) {
      this.parent.push(v);
    }
  }

  toArray(): VertexId[] {
    return [...this.parent];
  }
}

/**
 * Verify that parent links from every vertex end at a root.
 * Each vertex is walked at most once.
 */
function assertForest(parent: readonly number[]): void {
  const state = new Uint8Array(parent.length);
  const path: number[] = [];

  for (let start = 0; start < parent.length; start++) {
    let v = start;
    while (state[v] === UNSEEN && parent[v] !== v) {
      state[v] = ON_PATH;
      path.push(v);
      v = parent[v];
    }
    if (state[v] === ON_PATH) {
      throw new InvalidForestError(start);
    }
    state[v] = SETTLED;
    for (const u of path) state[u] = SETTLED;
    path.length = 0;
  }
}
