// Copyright 2026 Google LLC
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { AdjacencyListSchema, ParentArraySchema } from '@graphlink/core';

/** `{ "parents": [...] }` — an initial forest for find and union. */
export const ForestFileSchema = z.object({
  parents: ParentArraySchema,
});
export type ForestFile = z.infer<typeof ForestFileSchema>;

/** `{ "adjacency": [[...], ...] }` — per-vertex neighbor lists. */
export const AdjacencyFileSchema = z.object({
  adjacency: AdjacencyListSchema,
});
export type AdjacencyFile = z.infer<typeof AdjacencyFileSchema>;

export type GraphFileResult<T> =
  | { ok: true; data: T }
  | { ok: false; code: 'INPUT_READ_FAILED' | 'INVALID_GRAPH'; error: string };

/**
 * Read a JSON graph file and validate it against `schema`.
 * Never throws.
 */
export async function readGraphFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<GraphFileResult<T>> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    return {
      ok: false,
      code: 'INPUT_READ_FAILED',
      error: error instanceof Error ? error.message : String(error),
    };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      code: 'INVALID_GRAPH',
      error: `${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      code: 'INVALID_GRAPH',
      error: `${path}: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
    };
  }
  return { ok: true, data: parsed.data };
}
