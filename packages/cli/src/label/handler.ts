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
  ConnectivityLabeler,
  OutOfRangeError,
  type GraphEmitter,
} from '@graphlink/core';
import type { LabelInput, LabelResult, LabelSpec } from './spec.js';
import { AdjacencyFileSchema, readGraphFile } from '../shared/graph-file.js';
import { ok, fail } from '../shared/result.js';

export interface LabelHandlerDeps {
  emit?: GraphEmitter;
}

/**
 * Loads an adjacency list and labels its connected components.
 * Never throws — all errors returned as Result.
 */
export class LabelHandler implements LabelSpec {
  private readonly emit?: GraphEmitter;

  constructor(deps: LabelHandlerDeps = {}) {
    this.emit = deps.emit;
  }

  async execute(input: LabelInput): Promise<LabelResult> {
    const file = await readGraphFile(input.input, AdjacencyFileSchema);
    if (!file.ok) {
      return fail(
        file.code,
        file.error,
        false,
        'Provide a JSON file of the form { "adjacency": [[1], [0], ...] }.',
      );
    }

    try {
      const labeler = new ConnectivityLabeler(file.data.adjacency, {
        emit: this.emit,
      });
      const labels = labeler.connectivityLabels();
      return ok({ labels, components: new Set(labels).size });
    } catch (error) {
      if (error instanceof OutOfRangeError) {
        return fail(
          'OUT_OF_RANGE',
          error.message,
          false,
          'Every neighbor id must name a vertex of the adjacency list.',
        );
      }
      return fail(
        'UNKNOWN_ERROR',
        error instanceof Error ? error.message : String(error),
        false,
      );
    }
  }
}
