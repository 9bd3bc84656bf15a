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

// src/index.ts
export { DisjointSet } from './disjoint-set.js';
export type { DisjointSetOptions, FindRootOptions } from './disjoint-set.js';
export { ConnectivityLabeler, connectivityLabels, UNVISITED } from './labeler.js';
export type { LabelerOptions } from './labeler.js';
export { ParentMapping } from './parent-mapping.js';
export {
  findRootsPlain,
  findRootsHalving,
  findRootsFull,
  findRootsCompressed,
} from './root-finder.js';
export { quickUnion } from './quick-union.js';
export type { UnionOptions } from './quick-union.js';
export { weightedUnion } from './weighted-union.js';
export type { WeightedAttach } from './weighted-union.js';
export { RootSizeTable } from './root-sizes.js';
export * from './errors.js';
export type { DisjointSetEvent, LabelEvent, GraphEvent, GraphEmitter } from './events.js';
export {
  VertexIdSchema,
  VertexBatchSchema,
  CompressionModeSchema,
  ParentArraySchema,
  AdjacencyListSchema,
  parseVertexId,
  parseCompressionMode,
  toVertexBatch,
} from './vertex.js';
export type { VertexId, VertexInput, CompressionMode } from './vertex.js';
