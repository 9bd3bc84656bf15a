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

import type { GraphEvent } from '@graphlink/core';
import type { GraphRenderer } from './spec.js';

/**
 * PlainRenderer writes one line per event to stderr, so that stdout
 * carries nothing but the JSON result.
 */
export class PlainRenderer implements GraphRenderer {
  constructor(private readonly write: (line: string) => void = console.error) {}

  start(title: string): void {
    this.write(`═══ ${title} ═══`);
  }

  end(message: string): void {
    this.write(`═══ ${message} ═══`);
  }

  error(message: string): void {
    this.write(`ERROR: ${message}`);
  }

  render(event: GraphEvent): void {
    this.write(formatEvent(event));
  }
}

export function formatEvent(event: GraphEvent): string {
  switch (event.type) {
    // ── Disjoint-set events ──────────────────────────────────────
    case 'sizes:rebuilt':
      return event.reason === 'absent'
        ? `Built size table (${event.roots} roots)`
        : `Rebuilt size table after vertex count changed (${event.roots} roots)`;
    case 'union:skipped':
      return `  ⊘ ${event.kind} union skipped — already joined`;
    case 'union:merged':
      return event.kind === 'quick'
        ? `  ✓ quick union wrote ${event.pairs} pair(s)`
        : `  ✓ root ${event.absorbed} attached under ${event.into} (size ${event.size})`;
    case 'vertices:added':
      return `Added ${event.count} vertex(es), ${event.total} total`;

    // ── Labeler events ───────────────────────────────────────────
    case 'label:component':
      return `  Component ${event.label}: ${event.size} vertex(es) from ${event.seed}`;
    case 'label:done':
      return `Labeling complete — ${event.components} component(s)`;
  }
}
