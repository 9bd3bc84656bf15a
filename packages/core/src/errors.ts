/**
 * Copyright 2026 Google LLC
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

// src/errors.ts

/**
 * Base class for all graphlink errors.
 * Consumers can catch every engine failure with a single `catch` block.
 */
export class GraphLinkError extends Error {
  /** The original error that caused this error, if any. */
  public readonly cause?: Error;

  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;
  }
}

/**
 * Thrown when an argument has the wrong shape: a batch passed where a
 * single vertex id is required, a non-integral id, mismatched batch
 * lengths or an unknown compression mode.
 */
export class InvalidArgumentError extends GraphLinkError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
  }
}

/**
 * Thrown when a vertex id falls outside `[0, size)`.
 */
export class OutOfRangeError extends GraphLinkError {
  public readonly vertex: number;
  public readonly size: number;

  constructor(vertex: number, size: number) {
    super(`Vertex ${vertex} is out of range for a graph of ${size} vertices`);
    this.vertex = vertex;
    this.size = size;
  }
}

/**
 * Thrown when an initial parent array does not encode a forest, i.e.
 * following parents from some vertex never reaches a self-parented root.
 */
export class InvalidForestError extends GraphLinkError {
  public readonly vertex: number;

  constructor(vertex: number) {
    super(
      `Parent links starting at vertex ${vertex} form a cycle that never reaches a root`,
    );
    this.vertex = vertex;
  }
}
