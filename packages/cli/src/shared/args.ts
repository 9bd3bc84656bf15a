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

import type { z } from 'zod';

/**
 * Split a comma-separated id list such as `2,10,7`. Entries that are not
 * numbers come back as NaN and are rejected by the input schema.
 */
export function parseIdList(value: string | undefined): number[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .map((s) => (/^-?\d+$/.test(s) ? parseInt(s, 10) : Number.NaN));
}

/**
 * Print schema issues as a usage error and exit with status 2.
 */
export function exitWithUsage(error: z.ZodError): never {
  for (const issue of error.issues) {
    const where = issue.path.length > 0 ? `--${issue.path.join('.')}: ` : '';
    console.error(`${where}${issue.message}`);
  }
  process.exit(2);
}
