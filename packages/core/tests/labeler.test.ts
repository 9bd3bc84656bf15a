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

import { describe, it, expect, vi } from 'vitest';
import {
  ConnectivityLabeler,
  connectivityLabels,
} from '../src/labeler.js';
import { DisjointSet } from '../src/disjoint-set.js';
import { InvalidArgumentError, OutOfRangeError } from '../src/errors.js';

const SAMPLE_ADJACENCY = [
  [1, 2],
  [0],
  [0],
  [4, 5],
  [3, 9],
  [3],
  [9],
  [],
  [9, 10],
  [4, 6, 8],
  [8],
];

describe('ConnectivityLabeler', () => {
  it('labels components in discovery order', () => {
    const labeler = new ConnectivityLabeler(SAMPLE_ADJACENCY);
    expect(labeler.connectivityLabels()).toEqual([
      0, 0, 0, 1, 1, 1, 1, 2, 1, 1, 1,
    ]);
  });

  it('returns a fresh array on every call', () => {
    const labeler = new ConnectivityLabeler(SAMPLE_ADJACENCY);
    const first = labeler.connectivityLabels();
    const second = labeler.connectivityLabels();
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it('emits one event per component and a summary', () => {
    const emit = vi.fn();
    connectivityLabels(SAMPLE_ADJACENCY, { emit });
    expect(emit.mock.calls.map(([event]) => event)).toEqual([
      { type: 'label:component', label: 0, seed: 0, size: 3 },
      { type: 'label:component', label: 1, seed: 3, size: 7 },
      { type: 'label:component', label: 2, seed: 7, size: 1 },
      { type: 'label:done', components: 3 },
    ]);
  });

  it('follows only the edges that are listed', () => {
    // 0 lists 1, so scanning from 0 reaches 1.
    expect(connectivityLabels([[1], [], []])).toEqual([0, 0, 1]);
    // Only 1 lists 0; 0 is labelled before 1 is seen.
    expect(connectivityLabels([[], [0]])).toEqual([0, 1]);
  });

  it('labels an empty graph', () => {
    expect(connectivityLabels([])).toEqual([]);
  });

  it('handles self loops', () => {
    expect(connectivityLabels([[0], [1, 2], [1]])).toEqual([0, 1, 1]);
  });

  it('labels a long path without exhausting the call stack', () => {
    const n = 200_000;
    const adjacency = Array.from({ length: n }, (_, v) =>
      [v - 1, v + 1].filter((u) => u >= 0 && u < n),
    );
    const labels = connectivityLabels(adjacency);
    expect(labels).toHaveLength(n);
    expect(labels.every((label) => label === 0)).toBe(true);
  });

  it('agrees with union-find on which vertices share a component', () => {
    const edges = [
      [0, 5],
      [5, 9],
      [2, 3],
      [3, 7],
      [7, 2],
      [4, 8],
      [10, 11],
    ];
    const n = 12;
    const adjacency: number[][] = Array.from({ length: n }, () => []);
    const ds = DisjointSet.identity(n);
    for (const [a, b] of edges) {
      adjacency[a].push(b);
      adjacency[b].push(a);
      ds.union(a, b);
    }

    const labels = connectivityLabels(adjacency);
    for (let a = 0; a < n; a++) {
      for (let b = 0; b < n; b++) {
        expect(labels[a] === labels[b]).toBe(ds.connected(a, b));
      }
    }
    expect(new Set(labels).size).toBe(ds.componentCount());
    expect(labels).toEqual([0, 1, 2, 2, 3, 0, 4, 2, 3, 0, 5, 5]);
  });

  it('rejects neighbors outside the graph', () => {
    expect(() => new ConnectivityLabeler([[1], [2]])).toThrow(OutOfRangeError);
  });

  it('rejects negative neighbor ids as out of range', () => {
    expect(() => new ConnectivityLabeler([[-1]])).toThrow(
      'Vertex -1 is out of range for a graph of 1 vertices',
    );
  });

  it('rejects malformed neighbor ids', () => {
    expect(() => new ConnectivityLabeler([[0.5]])).toThrow(
      InvalidArgumentError,
    );
  });
});
