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

// src/labeler.ts
import { InvalidArgumentError } from './errors.js';
import type { GraphEmitter } from './events.js';
import { AdjacencyListSchema, assertInRange } from './vertex.js';

/** Label held by a vertex no traversal has reached yet. */
export const UNVISITED = -1;

export interface LabelerOptions {
  emit?: GraphEmitter;
}

/**
 * Connected-component labeling over an adjacency list.
 *
 * Vertices are scanned in id order; each unvisited vertex seeds the next
 * label, and every vertex reachable from it through the listed edges gets
 * that label. Only listed edges are followed, so an undirected graph needs
 * both directions of every edge in the list.
 */
export class ConnectivityLabeler {
  private readonly adjacency: readonly (readonly number[])[];
  private readonly emit?: GraphEmitter;

  constructor(
    adjacency: readonly (readonly number[])[],
    options: LabelerOptions = {},
  ) {
    const parsed = AdjacencyListSchema.safeParse(adjacency);
    if (!parsed.success) {
      throw new InvalidArgumentError(
        'Adjacency list must be an array of arrays of integers',
      );
    }
    const size = parsed.data.length;
    for (const neighbors of parsed.data) {
      for (const n of neighbors) {
        assertInRange(n, size);
      }
    }
    this.adjacency = parsed.data;
    this.emit = options.emit;
  }

  get size(): number {
    return this.adjacency.length;
  }

  /**
   * Label every vertex with its component, numbered from 0 in discovery
   * order. Each call allocates and returns a fresh array.
   */
  connectivityLabels(): number[] {
    const labels = new Array<number>(this.size).fill(UNVISITED);
    // Explicit stack: component size is not bounded by call depth.
    const stack: number[] = [];
    let next = 0;

    for (let seed = 0; seed < this.size; seed++) {
      if (labels[seed] !== UNVISITED) continue;

      const label = next++;
      let size = 0;
      labels[seed] = label;
      stack.push(seed);

      while (stack.length > 0) {
        const v = stack.pop();
        if (v === undefined) break;
        size++;
        for (const n of this.adjacency[v]) {
          if (labels[n] === UNVISITED) {
            labels[n] = label;
            stack.push(n);
          }
        }
      }
      this.emit?.({ type: 'label:component', label, seed, size });
    }

    this.emit?.({ type: 'label:done', components: next });
    return labels;
  }
}

/** One-shot helper around {@link ConnectivityLabeler}. */
export function connectivityLabels(
  adjacency: readonly (readonly number[])[],
  options?: LabelerOptions,
): number[] {
  return new ConnectivityLabeler(adjacency, options).connectivityLabels();
}
