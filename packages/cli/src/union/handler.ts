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
import type { UnionInput, UnionResult, UnionSpec } from './spec.js';
import { ForestFileSchema, readGraphFile } from '../shared/graph-file.js';
import { failFromEngineError } from '../shared/engine-errors.js';
import { ok, fail } from '../shared/result.js';

export interface UnionHandlerDeps {
  emit?: GraphEmitter;
}

/**
 * Loads a forest and joins the requested pairs, either as one batched
 * quick union or as a sequence of scalar weighted unions.
 * Never throws — all errors returned as Result.
 */
export class UnionHandler implements UnionSpec {
  private readonly emit?: GraphEmitter;

  constructor(deps: UnionHandlerDeps = {}) {
    this.emit = deps.emit;
  }

  async execute(input: UnionInput): Promise<UnionResult> {
    const file = await readGraphFile(input.input, ForestFileSchema);
    if (!file.ok) {
      return fail(
        file.code,
        file.error,
        false,
        'Provide a JSON file of the form { "parents": [0, 0, 1, ...] }.',
      );
    }

    const options = { compress: input.compress, mode: input.mode };
    try {
      const forest = new DisjointSet(file.data.parents, { emit: this.emit });

      if (!input.weighted) {
        forest.union(input.minor, input.main, options);
        return ok({
          parents: forest.parents(),
          components: forest.componentCount(),
        });
      }

      // Weighted unions take one pair at a time.
      input.minor.forEach((minor, k) => {
        forest.weightedUnion(minor, input.main[k], options);
      });
      const sizes = forest.rootSizes();
      return ok({
        parents: forest.parents(),
        components: forest.componentCount(),
        ...(sizes
          ? { rootSizes: [...sizes].map(([root, size]) => ({ root, size })) }
          : {}),
      });
    } catch (error) {
      return failFromEngineError(error);
    }
  }
}
