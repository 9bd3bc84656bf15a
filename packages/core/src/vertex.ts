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

// src/vertex.ts
import { z } from 'zod';
import { InvalidArgumentError, OutOfRangeError } from './errors.js';

/**
 * A vertex identifier. Range checks against the owning graph happen
 * separately, since the schema does not know the graph size.
 */
export const VertexIdSchema = z.number().int();
export type VertexId = z.infer<typeof VertexIdSchema>;

export const VertexBatchSchema = z.array(VertexIdSchema);

/** A single vertex id or an ordered batch of them. */
export type VertexInput = VertexId | readonly VertexId[];

export const CompressionModeSchema = z.enum(['path_halving', 'full']);
export type CompressionMode = z.infer<typeof CompressionModeSchema>;

/** Entries are range-checked against the array length by their consumers. */
export const ParentArraySchema = z.array(VertexIdSchema);
export const AdjacencyListSchema = z.array(z.array(VertexIdSchema));

/**
 * Parse a value that must be exactly one vertex id.
 * Batches, non-numbers and non-integral numbers are rejected.
 */
export function parseVertexId(value: unknown, size: number): VertexId {
  const parsed = VertexIdSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Expected a single integral vertex id, received ${describe(value)}`,
    );
  }
  assertInRange(parsed.data, size);
  return parsed.data;
}

/**
 * Normalize scalar-or-batch input to a fresh array of in-range ids.
 */
export function toVertexBatch(ids: VertexInput, size: number): VertexId[] {
  const batch = typeof ids === 'number' ? [ids] : [...ids];
  for (const id of batch) {
    if (!Number.isInteger(id)) {
      throw new InvalidArgumentError(
        `Vertex ids must be integers, received ${describe(id)}`,
      );
    }
    assertInRange(id, size);
  }
  return batch;
}

export function parseCompressionMode(value: unknown): CompressionMode {
  const parsed = CompressionModeSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(
      `Unknown compression mode ${describe(value)}; expected 'path_halving' or 'full'`,
    );
  }
  return parsed.data;
}

export function assertInRange(id: number, size: number): void {
  if (id < 0 || id >= size) {
    throw new OutOfRangeError(id, size);
  }
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return `an array of length ${value.length}`;
  if (typeof value === 'string') return `'${value}'`;
  return String(value);
}
