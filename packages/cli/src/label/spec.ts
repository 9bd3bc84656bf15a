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

// INPUT
export const LabelInputSchema = z.object({
  /** Path to a `{ "adjacency": [[...], ...] }` JSON file */
  input: z.string().min(1),
});
export type LabelInput = z.infer<typeof LabelInputSchema>;

// ERROR CODES (exhaustive)
export const LabelErrorCode = z.enum([
  'INPUT_READ_FAILED',
  'INVALID_GRAPH',
  'OUT_OF_RANGE',
  'UNKNOWN_ERROR',
]);
export type LabelErrorCode = z.infer<typeof LabelErrorCode>;

// SUCCESS DATA
export interface LabelData {
  /** Component label per vertex, numbered in discovery order */
  labels: number[];
  components: number;
}

// RESULT (Discriminated Union)
export interface LabelSuccess {
  success: true;
  data: LabelData;
}
export interface LabelFailure {
  success: false;
  error: {
    code: LabelErrorCode;
    message: string;
    recoverable: boolean;
    suggestion?: string;
  };
}
export type LabelResult = LabelSuccess | LabelFailure;

// INTERFACE (Capability)
export interface LabelSpec {
  execute(input: LabelInput): Promise<LabelResult>;
}
