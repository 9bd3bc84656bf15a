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
import { LabelInputSchema } from '../label/spec.js';
import { LabelHandler } from '../label/handler.js';
import { exitWithUsage } from '../shared/args.js';
import { createEmitter, createRenderer } from '../shared/ui/index.js';

export default defineCommand({
  meta: {
    name: 'label',
    description: 'Label the connected components of an adjacency list.',
  },
  args: {
    input: {
      type: 'string',
      description: 'JSON file with an "adjacency" array of neighbor lists',
      required: true,
    },
    verbose: {
      type: 'boolean',
      description: 'Log one line per component to stderr',
      default: false,
    },
  },
  async run({ args }) {
    const parsed = LabelInputSchema.safeParse({ input: args.input });
    if (!parsed.success) {
      exitWithUsage(parsed.error);
    }

    const renderer = createRenderer(args.verbose);
    renderer?.start(`Labeling ${args.input}`);
    const handler = new LabelHandler({ emit: createEmitter(renderer) });
    const result = await handler.execute(parsed.data);
    if (result.success) {
      renderer?.end(`Labeled ${result.data.components} component(s)`);
    } else {
      renderer?.error(result.error.message);
    }

    process.stdout.write(JSON.stringify(result, null, 2) + '\n');
    process.exit(result.success ? 0 : 1);
  },
});
