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

// src/events.ts

/** Disjoint-set events */
export type DisjointSetEvent =
  | { type: 'sizes:rebuilt'; reason: 'absent' | 'length-mismatch'; roots: number }
  | { type: 'union:skipped'; kind: 'quick' | 'weighted' }
  | { type: 'union:merged'; kind: 'quick'; pairs: number }
  | { type: 'union:merged'; kind: 'weighted'; absorbed: number; into: number; size: number }
  | { type: 'vertices:added'; count: number; total: number };

/** Labeler events */
export type LabelEvent =
  | { type: 'label:component'; label: number; seed: number; size: number }
  | { type: 'label:done'; components: number };

export type GraphEvent = DisjointSetEvent | LabelEvent;

/** Callback that receives engine events. */
export type GraphEmitter = (event: GraphEvent) => void;
