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

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { CompressionModeSchema } from '@graphlink/core';

const LookupSectionSchema = z.object({
  compress: z.boolean().optional(),
  mode: CompressionModeSchema.optional(),
});
export type LookupSection = z.infer<typeof LookupSectionSchema>;

/** Parsed configuration from .graphlink/config.yml */
export interface GraphLinkConfig {
  /** Defaults for `graphlink find` */
  find?: LookupSection;
  /** Defaults for `graphlink union` */
  union?: LookupSection;
}

/**
 * Read and parse the configuration file under `root`.
 * Returns empty config if the file doesn't exist or is malformed; a
 * malformed section is dropped on its own.
 */
export function readGraphLinkConfig(root: string): GraphLinkConfig {
  const configPath = join(root, '.graphlink', 'config.yml');

  if (!existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch {
    // Malformed YAML: fall back to defaults
    return {};
  }

  if (!parsed || typeof parsed !== 'object') {
    return {};
  }

  const sections: Record<string, unknown> = { ...parsed };
  return {
    find: section(sections.find),
    union: section(sections.union),
  };
}

function section(value: unknown): LookupSection | undefined {
  const parsed = LookupSectionSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

