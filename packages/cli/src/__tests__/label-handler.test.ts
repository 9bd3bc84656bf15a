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

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { LabelHandler } from '../label/handler.js';

describe('LabelHandler', () => {
  let tempDir: string;
  let graphPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'label-test-'));
    graphPath = join(tempDir, 'graph.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('labels each connected component', async () => {
    await writeFile(
      graphPath,
      JSON.stringify({
        adjacency: [[1, 2], [0], [0], [4, 5], [3, 9], [3], [9], [], [9, 10], [4, 6, 8], [8]],
      }),
    );
    const result = await new LabelHandler().execute({ input: graphPath });

    expect(result).toEqual({
      success: true,
      data: {
        labels: [0, 0, 0, 1, 1, 1, 1, 2, 1, 1, 1],
        components: 3,
      },
    });
  });

  it('returns OUT_OF_RANGE for a neighbor outside the list', async () => {
    await writeFile(graphPath, JSON.stringify({ adjacency: [[3], []] }));
    const result = await new LabelHandler().execute({ input: graphPath });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('OUT_OF_RANGE');
      expect(result.error.recoverable).toBe(false);
    }
  });

  it('returns INVALID_GRAPH for malformed JSON', async () => {
    await writeFile(graphPath, '{ "adjacency": [');
    const result = await new LabelHandler().execute({ input: graphPath });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('INVALID_GRAPH');
    }
  });

  it('returns OUT_OF_RANGE for negative neighbor ids', async () => {
    await writeFile(graphPath, JSON.stringify({ adjacency: [[-1]] }));
    const result = await new LabelHandler().execute({ input: graphPath });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('OUT_OF_RANGE');
      expect(result.error.message).toBe(
        'Vertex -1 is out of range for a graph of 1 vertices',
      );
    }
  });

  it('returns INVALID_GRAPH for fractional neighbor ids', async () => {
    await writeFile(graphPath, JSON.stringify({ adjacency: [[0.5]] }));
    const result = await new LabelHandler().execute({ input: graphPath });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('INVALID_GRAPH');
      expect(result.error.message).toBe(
        `${graphPath}: adjacency.0.0: Expected integer, received float`,
      );
    }
  });
});
