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

import type { GraphEvent } from '@graphlink/core';

/**
 * GraphRenderer interface — the UI contract.
 * Implementations render engine events into terminal output.
 */
export interface GraphRenderer {
  /** Render a single event */
  render(event: GraphEvent): void;

  /** Start the UI (e.g., intro banner) */
  start(title: string): void;

  /** End the UI (e.g., outro message) */
  end(message: string): void;

  /** End the UI with an error */
  error(message: string): void;
}
