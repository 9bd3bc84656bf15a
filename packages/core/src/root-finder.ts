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

// src/root-finder.ts
import type { ParentMapping } from './parent-mapping.js';
import type { CompressionMode, VertexId } from './vertex.js';

/*
 * Batched root lookups. Every id in a batch advances one step per round;
 * ids that already sit on their root step onto themselves while the rest
 * keep climbing. Callers validate ids before reaching this module.
 */

function allRooted(mapping: ParentMapping, ids: readonly VertexId[]): boolean {
  return ids.every((v) => mapping.isRoot(v));
}

/**
 * Follow parent links until every id reaches its root. Never mutates.
 */
export function findRootsPlain(
  mapping: ParentMapping,
  ids: readonly VertexId[],
): VertexId[] {
  let current = [...ids];
  while (!allRooted(mapping, current)) {
    current = current.map((v) => mapping.get(v));
  }
  return current;
}

/**
 * Path halving. Each round reads every walker's grandparent first, then
 * points each walker at it (in input order), then advances every walker
 * to its rewritten parent.
 */
export function findRootsHalving(
  mapping: ParentMapping,
  ids: readonly VertexId[],
): VertexId[] {
  let current = [...ids];
  while (!allRooted(mapping, current)) {
    const grandparents = current.map((v) => mapping.get(mapping.get(v)));
    current.forEach((v, k) => mapping.set(v, grandparents[k]));
    current = current.map((v) => mapping.get(v));
  }
  return current;
}

/**
 * Full compression: locate the roots without mutation, then walk the
 * same paths again and point every visited vertex straight at its root.
 */
export function findRootsFull(
  mapping: ParentMapping,
  ids: readonly VertexId[],
): VertexId[] {
  const roots = findRootsPlain(mapping, ids);
  let walkers = [...ids];
  while (walkers.some((v, k) => v !== roots[k])) {
    const next = walkers.map((v) => mapping.get(v));
    walkers.forEach((v, k) => mapping.set(v, roots[k]));
    walkers = next;
  }
  return roots;
}

export function findRootsCompressed(
  mapping: ParentMapping,
  ids: readonly VertexId[],
  mode: CompressionMode,
): VertexId[] {
  switch (mode) {
    case 'path_halving':
      return findRootsHalving(mapping, ids);
    case 'full':
      return findRootsFull(mapping, ids);
  }
}
