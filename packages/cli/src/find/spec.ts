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

// INPUT
export const FindInputSchema = z.object({
  /** Path to a `{ "parents": [...] }` JSON file */
  input: z.string().min(1),
  /** Vertices whose roots are sought */
  ids: VertexBatchSchema.min(1),
  compress: z.boolean().default(true),
  mode: CompressionModeSchema.default('path_halving'),
});
export type FindInput = z.infer<typeof FindInputSchema>;

// ERROR CODES (exhaustive)
export const FindErrorCode = z.enum([
  'INPUT_READ_FAILED',
  'INVALID_GRAPH',
  'INVALID_ARGUMENT',
  'OUT_OF_RANGE',
  'UNKNOWN_ERROR',
]);
export type FindErrorCode = z.infer<typeof FindErrorCode>;

// SUCCESS DATA
export interface FindData {
  /** Roots aligned with the requested ids */
  roots: number[];
  /** Parent array after the lookup's compression */
  parents: number[];
}

// RESULT (Discriminated Union)
export interface FindSuccess {
  success: true;
  data: FindData;
}
export interface FindFailure {
  success: false;
  error: {
    code: FindErrorCode;
    message: string;
    recoverable: boolean;
    suggestion?: string;
  };
}
export type FindResult = FindSuccess | FindFailure;

// INTERFACE (Capability)
export interface FindSpec {
  execute(input: FindInput): Promise<FindResult>;
}
