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

import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { exitWithUsage, parseIdList } from '../shared/args.js';

describe('parseIdList', () => {
  it('splits a comma-separated list', () => {
    expect(parseIdList('2, 10,7')).toEqual([2, 10, 7]);
  });

  it('turns non-integers into NaN', () => {
    expect(parseIdList('1,x,2.5')).toEqual([1, Number.NaN, Number.NaN]);
  });

  it('returns an empty list for a missing flag', () => {
    expect(parseIdList(undefined)).toEqual([]);
  });
});

describe('exitWithUsage', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints each issue with its flag and exits with status 2', () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exited');
    });
    const error = new z.ZodError([
      { code: 'custom', path: ['ids', 0], message: 'Expected an integer id' },
      { code: 'custom', path: [], message: 'Batches must match' },
    ]);

    expect(() => exitWithUsage(error)).toThrow('exited');
    expect(log.mock.calls).toEqual([
      ['--ids.0: Expected an integer id'],
      ['Batches must match'],
    ]);
    expect(exit).toHaveBeenCalledWith(2);
  });
});
