// SPDX-License-Identifier: Apache-2.0

/**
 * A subchart materialized as a directory, the form found inside an extracted archive.
 */
export interface DirectoryForm {
  readonly kind: 'directory';
  readonly name: string;
  readonly path: string;
}

/**
 * A subchart still packaged as an archive, the form left by helm and by this resolver.
 */
export interface ArchiveForm {
  readonly kind: 'archive';
  readonly name: string;
  readonly path: string;
  /** the archive name without its extension */
  readonly fullyQualifiedName: string;
}

/**
 * Anything else found in a subcharts directory.
 */
export interface OtherEntry {
  readonly kind: 'other';
  readonly name: string;
  readonly path: string;
}

export type SubchartEntry = DirectoryForm | ArchiveForm | OtherEntry;

export function isDirectoryForm(entry: SubchartEntry): entry is DirectoryForm {
  return entry.kind === 'directory';
}

export function isArchiveForm(entry: SubchartEntry): entry is ArchiveForm {
  return entry.kind === 'archive';
}
