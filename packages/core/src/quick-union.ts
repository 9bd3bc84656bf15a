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

// src/quick-union.ts
import type { ParentMapping } from './parent-mapping.js';
import { findRootsCompressed, findRootsPlain } from './root-finder.js';
import type { CompressionMode, VertexId } from './vertex.js';

export interface UnionOptions {
  /** Compress the paths walked while locating roots. Defaults to true. */
  compress?: boolean;
  /** Compression strategy when `compress` is set. Defaults to path halving. */
  mode?: CompressionMode;
}

export function resolveRoots(
  mapping: ParentMapping,
  ids: readonly VertexId[],
  options: Required<UnionOptions>,
): VertexId[] {
  return options.compress
    ? findRootsCompressed(mapping, ids, options.mode)
    : findRootsPlain(mapping, ids);
}

/**
 * Attach the root of each `minor[k]` under the root of `main[k]`, with no
 * balancing.
 *
 * The short-circuit is batch-wide: nothing is written only when every
 * pair already shares a root. Otherwise every pair is written, including
 * already-joined ones (a self-assignment), and a root repeated in `minor`
 * ends up under the last `main` it was paired with.
 *
 * @returns the number of pairs written, or 0 when the call was a no-op.
 */
export function quickUnion(
  mapping: ParentMapping,
  minor: readonly VertexId[],
  main: readonly VertexId[],
  options: Required<UnionOptions>,
): number {
  const i = resolveRoots(mapping, minor, options);
  const j = resolveRoots(mapping, main, options);

  if (i.every((root, k) => root === j[k])) {
    return 0;
  }

  i.forEach((root, k) => mapping.set(root, j[k]));
  return i.length;
}
