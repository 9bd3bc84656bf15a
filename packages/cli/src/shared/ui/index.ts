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

import type { GraphEmitter } from '@graphlink/core';
import type { GraphRenderer } from './spec.js';
import { PlainRenderer } from './plain.js';

export type { GraphRenderer } from './spec.js';
export { PlainRenderer, formatEvent } from './plain.js';

/**
 * Create the renderer for `--verbose` runs, or nothing when quiet.
 */
export function createRenderer(verbose: boolean): GraphRenderer | undefined {
  return verbose ? new PlainRenderer() : undefined;
}

/**
 * Create an emitter function that forwards events to a renderer.
 */
export function createEmitter(
  renderer: GraphRenderer | undefined,
): GraphEmitter | undefined {
  return renderer ? (event) => renderer.render(event) : undefined;
}
