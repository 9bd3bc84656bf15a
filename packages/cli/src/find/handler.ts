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

import { DisjointSet, type GraphEmitter } from '@graphlink/core';
import type { FindInput, FindResult, FindSpec } from './spec.js';
import { ForestFileSchema, readGraphFile } from '../shared/graph-file.js';
import { failFromEngineError } from '../shared/engine-errors.js';
import { ok, fail } from '../shared/result.js';

export interface FindHandlerDeps {
  emit?: GraphEmitter;
}

/**
 * Loads a forest and resolves the roots of the requested vertices.
 * Never throws — all errors returned as Result.
 */
export class FindHandler implements FindSpec {
  private readonly emit?: GraphEmitter;

  constructor(deps: FindHandlerDeps = {}) {
    this.emit = deps.emit;
  }

  async execute(input: FindInput): Promise<FindResult> {
    const file = await readGraphFile(input.input, ForestFileSchema);
    if (!file.ok) {
      return fail(
        file.code,
        file.error,
        false,
        'Provide a JSON file of the form { "parents": [0, 0, 1, ...] }.',
      );
    }

    try {
      const forest = new DisjointSet(file.data.parents, { emit: this.emit });
      const roots = forest.findRoot(input.ids, {
        compress: input.compress,
        mode: input.mode,
      });
      return ok({ roots, parents: forest.parents() });
    } catch (error) {
      return failFromEngineError(error);
    }
  }
}
