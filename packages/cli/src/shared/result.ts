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

/**
 * Result helpers shared by every handler. Handlers return a `Result`
 * instead of throwing: errors are values.
 */

export interface Ok<T> {
  success: true;
  data: T;
}

export interface Fail<C extends string> {
  success: false;
  error: {
    code: C;
    message: string;
    recoverable: boolean;
    suggestion?: string;
  };
}

export function ok<T>(data: T): Ok<T> {
  return { success: true, data };
}

export function fail<C extends string>(
  code: C,
  message: string,
  recoverable: boolean,
  suggestion?: string,
): Fail<C> {
  return {
    success: false,
    error: {
      code,
      message,
      recoverable,
      ...(suggestion ? { suggestion } : {}),
    },
  };
}
