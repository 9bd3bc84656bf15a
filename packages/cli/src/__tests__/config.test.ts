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

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { readGraphLinkConfig } from '../shared/config.js';

function makeTempRoot(configYaml?: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'graphlink-config-test-'));
  if (configYaml !== undefined) {
    mkdirSync(join(dir, '.graphlink'), { recursive: true });
    writeFileSync(join(dir, '.graphlink', 'config.yml'), configYaml);
  }
  return dir;
}

describe('readGraphLinkConfig', () => {
  it('returns empty config when no .graphlink/config.yml exists', () => {
    const dir = makeTempRoot();
    expect(readGraphLinkConfig(dir)).toEqual({});
  });

  it('parses both command sections', () => {
    const dir = makeTempRoot(`
find:
  compress: false
union:
  mode: full
`);
    expect(readGraphLinkConfig(dir)).toEqual({
      find: { compress: false },
      union: { mode: 'full' },
    });
  });

  it('returns empty config for malformed YAML', () => {
    const dir = makeTempRoot('find: [unclosed');
    expect(readGraphLinkConfig(dir)).toEqual({});
  });

  it('returns empty config for empty file', () => {
    const dir = makeTempRoot('');
    expect(readGraphLinkConfig(dir)).toEqual({});
  });

  it('drops a section with an unknown compression mode', () => {
    const dir = makeTempRoot(`
find:
  mode: full_pc
union:
  compress: true
`);
    const config = readGraphLinkConfig(dir);
    expect(config.find).toBeUndefined();
    expect(config.union).toEqual({ compress: true });
  });
});
