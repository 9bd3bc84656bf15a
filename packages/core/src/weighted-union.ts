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

// src/weighted-union.ts
import type { ParentMapping } from './parent-mapping.js';
import { resolveRoots, type UnionOptions } from './quick-union.js';
import type { RootSizeTable } from './root-sizes.js';
import type { VertexId } from './vertex.js';

export interface WeightedAttach {
  absorbed: VertexId;
  into: VertexId;
  /** Size of the surviving tree after the attach. */
  size: number;
}

/**
 * Join the trees of one `minor`/`main` pair, hanging the smaller tree
 * under the larger root. Ties go to `main`.
 *
 * `sizes` is called only when the roots differ, so an already-joined
 * pair never materializes the size table.
 *
 * @returns the attach performed, or `undefined` when both share a root.
 */
export function weightedUnion(
  mapping: ParentMapping,
  minor: VertexId,
  main: VertexId,
  options: Required<UnionOptions>,
  sizes: () => RootSizeTable,
): WeightedAttach | undefined {
  const [i] = resolveRoots(mapping, [minor], options);
  const [j] = resolveRoots(mapping, [main], options);
  if (i === j) return undefined;

  const table = sizes();
  const [absorbed, into] =
    table.sizeOf(i) <= table.sizeOf(j) ? [i, j] : [j, i];

  mapping.set(absorbed, into);
  const size = table.absorb(absorbed, into);
  return { absorbed, into, size };
}
