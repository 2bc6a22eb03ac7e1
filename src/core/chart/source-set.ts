// SPDX-License-Identifier: Apache-2.0

import {type Chart} from './chart.js';
import {AmbiguousSourceError} from '../errors/ambiguous-source-error.js';

export interface NoSourceMatch {
  readonly kind: 'none';
}

export interface SingleSourceMatch {
  readonly kind: 'one';
  readonly source: Chart;
  /** true when the source release is not exactly the requested one */
  readonly guessed: boolean;
}

export interface AmbiguousSourceMatch {
  readonly kind: 'ambiguous';
  readonly candidates: readonly Chart[];
}

export type SourceMatch = NoSourceMatch | SingleSourceMatch | AmbiguousSourceMatch;

/**
 * The charts a caller supplies to stand in for dependencies. A source fulfills a dependency when the fully qualified
 * name of the dependency starts with the source name, so that a dependency like `some-dep-dev-1.0.0` can be
 * fulfilled by a source named `some-dep`.
 */
export class SourceSet {
  private readonly sources: readonly Chart[];

  public constructor(sources: Iterable<Chart> = []) {
    this.sources = [...sources];
  }

  public static empty(): SourceSet {
    return new SourceSet();
  }

  public get size(): number {
    return this.sources.length;
  }

  public toArray(): readonly Chart[] {
    return this.sources;
  }

  /**
   * Finds the sources able to fulfill a dependency, in the order they were supplied.
   *
   * @param dependencyFullName - fully qualified name of the dependency
   */
  public findOne(dependencyFullName: string): SourceMatch {
    const candidates = this.sources.filter(source => dependencyFullName.startsWith(source.name));
    if (candidates.length === 0) {
      return {kind: 'none'};
    }
    if (candidates.length > 1) {
      return {kind: 'ambiguous', candidates};
    }
    const source = candidates[0];
    return {kind: 'one', source, guessed: source.fullyQualifiedName !== dependencyFullName};
  }

  /**
   * Same as findOne, for callers that treat ambiguity as fatal.
   *
   * @throws AmbiguousSourceError when more than one source matches
   */
  public requireAtMostOne(dependencyFullName: string): NoSourceMatch | SingleSourceMatch {
    const match = this.findOne(dependencyFullName);
    if (match.kind === 'ambiguous') {
      throw new AmbiguousSourceError(
        dependencyFullName,
        match.candidates.map(candidate => candidate.location),
      );
    }
    return match;
  }
}
