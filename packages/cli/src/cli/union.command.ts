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
import { UnionInputSchema } from '../union/spec.js';
import { UnionHandler } from '../union/handler.js';
import { readGraphLinkConfig } from '../shared/config.js';
import { exitWithUsage, parseIdList } from '../shared/args.js';
import { createEmitter, createRenderer } from '../shared/ui/index.js';

export default defineCommand({
  meta: {
    name: 'union',
    description:
      'Join the trees of vertex pairs, as one batched quick union or pair by pair weighted by tree size.',
  },
  args: {
    input: {
      type: 'string',
      description: 'JSON file with a "parents" array',
      required: true,
    },
    minor: {
      type: 'string',
      description: 'Comma-separated vertices whose roots are attached',
      required: true,
    },
    main: {
      type: 'string',
      description: 'Comma-separated vertices whose roots receive them',
      required: true,
    },
    weighted: {
      type: 'boolean',
      description: 'Attach the smaller tree under the larger, one pair at a time',
      default: false,
    },
    mode: {
      type: 'string',
      description: 'Compression mode: path_halving or full',
    },
    compress: {
      type: 'boolean',
      description: 'Compress paths while searching for roots',
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
    const parsed = UnionInputSchema.safeParse({
      input: args.input,
      minor: parseIdList(args.minor),
      main: parseIdList(args.main),
      weighted: args.weighted,
      compress: args.compress ?? config.union?.compress,
      mode: args.mode || config.union?.mode,
    });
    if (!parsed.success) {
      exitWithUsage(parsed.error);
    }

    const handler = new UnionHandler({
      emit: createEmitter(createRenderer(args.verbose)),
    });
    const result = await handler.execute(parsed.data);

    process.stdout.write(JSON.stringify(result, null, 2) + '\n');
    process.exit(result.success ? 0 : 1);
  },
});
