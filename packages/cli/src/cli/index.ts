#!/usr/bin/env node
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

import { defineCommand, runMain } from 'citty';
import find from './find.command.js';
import union from './union.command.js';
import label from './label.command.js';

const main = defineCommand({
  meta: {
    name: 'graphlink',
    version: '0.1.0',
    description: 'Union-find and connected-component labeling for integer graphs',
  },
  subCommands: { find, union, label },
});

await runMain(main);
