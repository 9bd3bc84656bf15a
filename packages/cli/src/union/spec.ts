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

import { z } from 'zod';
import { CompressionModeSchema, VertexBatchSchema } from '@graphlink/core';

// ── INPUT ───────────────────────────────────────────────────────────

export const UnionInputSchema = z
  .object({
    /** Path to a `{ "parents": [...] }` JSON file */
    input: z.string().min(1),
    /** Vertices whose roots are attached */
    minor: VertexBatchSchema.min(1),
    /** Vertices whose roots receive them, pairwise with `minor` */
    main: VertexBatchSchema.min(1),
    /** Apply each pair as a size-weighted union instead of one batched quick union */
    weighted: z.boolean().default(false),
    compress: z.boolean().default(true),
    mode: CompressionModeSchema.default('path_halving'),
  })
  .refine((d) => d.minor.length === d.main.length, {
    message: '--minor and --main must list the same number of vertices',
    path: ['main'],
  });

export type UnionInput = z.infer<typeof UnionInputSchema>;

// ── ERROR CODES ─────────────────────────────────────────────────────

export const UnionErrorCode = z.enum([
  'INPUT_READ_FAILED',
  'INVALID_GRAPH',
  'INVALID_ARGUMENT',
  'OUT_OF_RANGE',
  'UNKNOWN_ERROR',
]);
export type UnionErrorCode = z.infer<typeof UnionErrorCode>;

// ── RESULT ──────────────────────────────────────────────────────────

export interface UnionSuccess {
  success: true;
  data: {
    /** Parent array after the unions */
    parents: number[];
    /** Number of trees left in the forest */
    components: number;
    /** Vertex count per root; only present after weighted unions */
    rootSizes?: Array<{ root: number; size: number }>;
  };
}

export interface UnionFailure {
  success: false;
  error: {
    code: UnionErrorCode;
    message: string;
    recoverable: boolean;
    suggestion?: string;
  };
}

export type UnionResult = UnionSuccess | UnionFailure;

// ── INTERFACE ───────────────────────────────────────────────────────

export interface UnionSpec {
  execute(input: UnionInput): Promise<UnionResult>;
}
