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

import {
  InvalidArgumentError,
  InvalidForestError,
  OutOfRangeError,
} from '@graphlink/core';
import { fail, type Fail } from './result.js';

export type EngineErrorCode =
  | 'INVALID_ARGUMENT'
  | 'OUT_OF_RANGE'
  | 'INVALID_GRAPH'
  | 'UNKNOWN_ERROR';

/**
 * Map an error thrown by the engine to a failure Result.
 */
export function failFromEngineError(error: unknown): Fail<EngineErrorCode> {
  if (error instanceof OutOfRangeError) {
    return fail(
      'OUT_OF_RANGE',
      error.message,
      true,
      `Use vertex ids between 0 and ${error.size - 1}.`,
    );
  }
  if (error instanceof InvalidForestError) {
    return fail(
      'INVALID_GRAPH',
      error.message,
      false,
      'Every parent chain must end at a vertex that is its own parent.',
    );
  }
  if (error instanceof InvalidArgumentError) {
    return fail('INVALID_ARGUMENT', error.message, true);
  }
  return fail(
    'UNKNOWN_ERROR',
    error instanceof Error ? error.message : String(error),
    false,
  );
}
