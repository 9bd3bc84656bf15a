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

import { defineCommand } from 'citty';
import { FindInputSchema } from '../find/spec.js';
import { FindHandler } from '../find/handler.js';
import { readGraphLinkConfig } from '../shared/config.js';
import { exitWithUsage, parseIdList } from '../shared/args.js';
import { createEmitter, createRenderer } from '../shared/ui/index.js';

export default defineCommand({
  meta: {
    name: 'find',
    description:
      'Find the roots of vertices in a forest, compressing the walked paths.',
  },
  args: {
    input: {
      type: 'string',
      description: 'JSON file with a "parents" array',
      required: true,
    },
    ids: {
      type: 'string',
      description: 'Comma-separated vertex ids, e.g. 2,10,7',
      required: true,
    },
    mode: {
      type: 'string',
      description: 'Compression mode: path_halving or full',
    },
    compress: {
      type: 'boolean',
      description: 'Compress paths while searching (--no-compress for a read-only lookup)',
    },
    root: {
      type: 'string',
      description: 'Directory holding .graphlink/config.yml',
      default: '.',
    },
    verbose: {
      type: 'boolean',
      description: 'Log engine events to stderr',
      default: false,
    },
  },
  async run({ args }) {
    const config = readGraphLinkConfig(args.root);
    const parsed = FindInputSchema.safeParse({
      input: args.input,
      ids: parseIdList(args.ids),
      compress: args.compress ?? config.find?.compress,
      mode: args.mode || config.find?.mode,
    });
    if (!parsed.success) {
      exitWithUsage(parsed.error);
    }

    const handler = new FindHandler({
      emit: createEmitter(createRenderer(args.verbose)),
    });
    const result = await handler.execute(parsed.data);

    process.stdout.write(JSON.stringify(result, null, 2) + '\n');
    process.exit(result.success ? 0 : 1);
  },
});
