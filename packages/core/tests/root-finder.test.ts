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

import { describe, it, expect } from 'vitest';
import { ParentMapping } from '../src/parent-mapping.js';
import {
  findRootsPlain,
  findRootsHalving,
  findRootsFull,
  findRootsCompressed,
} from '../src/root-finder.js';

// Three trees rooted at 0, 3 and 7; vertex 10 sits four links below 3.
const SAMPLE = [0, 0, 0, 3, 3, 3, 9, 7, 9, 4, 8];
const SAMPLE_ROOTS = [0, 0, 0, 3, 3, 3, 3, 7, 3, 3, 3];
const ALL = SAMPLE.map((_, v) => v);

describe('findRootsPlain', () => {
  it('returns roots aligned with the input batch', () => {
    const mapping = new ParentMapping(SAMPLE);
    expect(findRootsPlain(mapping, [2, 10, 7])).toEqual([0, 3, 7]);
  });

  it('does not mutate the mapping', () => {
    const mapping = new ParentMapping(SAMPLE);
    findRootsPlain(mapping, ALL);
    expect(mapping.toArray()).toEqual(SAMPLE);
  });

  it('handles duplicated ids in one batch', () => {
    const mapping = new ParentMapping(SAMPLE);
    expect(findRootsPlain(mapping, [10, 10, 1])).toEqual([3, 3, 0]);
  });

  it('returns an empty batch unchanged', () => {
    const mapping = new ParentMapping(SAMPLE);
    expect(findRootsPlain(mapping, [])).toEqual([]);
  });
});

describe('findRootsHalving', () => {
  it('points each visited vertex at its grandparent', () => {
    const mapping = new ParentMapping(SAMPLE);
    expect(findRootsHalving(mapping, [2, 10, 7])).toEqual([0, 3, 7]);
    expect(mapping.toArray()).toEqual([0, 0, 0, 3, 3, 3, 9, 7, 9, 3, 9]);
  });
});

describe('findRootsFull', () => {
  it('points every vertex on the walked paths at its root', () => {
    const mapping = new ParentMapping(SAMPLE);
    expect(findRootsFull(mapping, [2, 10, 7])).toEqual([0, 3, 7]);
    expect(mapping.toArray()).toEqual([0, 0, 0, 3, 3, 3, 9, 7, 3, 3, 3]);
  });

  it('is idempotent', () => {
    const mapping = new ParentMapping(SAMPLE);
    const first = findRootsFull(mapping, [2, 10, 7]);
    const afterFirst = mapping.toArray();

    const second = findRootsFull(mapping, [2, 10, 7]);
    expect(second).toEqual(first);
    expect(mapping.toArray()).toEqual(afterFirst);
  });

  it('flattens the whole forest when given every vertex', () => {
    const mapping = new ParentMapping(SAMPLE);
    findRootsFull(mapping, ALL);
    expect(mapping.toArray()).toEqual(SAMPLE_ROOTS);
  });
});

describe('root identity across modes', () => {
  it.each(['path_halving', 'full'] as const)(
    '%s finds the same roots as the plain lookup',
    (mode) => {
      for (const v of ALL) {
        const mapping = new ParentMapping(SAMPLE);
        expect(findRootsCompressed(mapping, [v], mode)).toEqual([
          SAMPLE_ROOTS[v],
        ]);
      }
      const mapping = new ParentMapping(SAMPLE);
      expect(findRootsCompressed(mapping, ALL, mode)).toEqual(SAMPLE_ROOTS);
    },
  );
});
