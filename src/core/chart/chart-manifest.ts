// SPDX-License-Identifier: Apache-2.0

import * as yaml from 'yaml';
import {InvalidManifestError} from '../errors/invalid-manifest-error.js';

/**
 * A dependency entry of a chart manifest. Fields other than `name` and `version` (repository, condition, alias...)
 * are kept as they are and handed back to helm untouched.
 */
export interface ChartDependency {
  readonly name: string;
  readonly version: string;
  readonly [field: string]: unknown;
}

/**
 * The parsed content of a chart manifest (Chart.yaml).
 */
export interface ChartManifest {
  readonly name: string;
  readonly version: string;
  readonly dependencies?: readonly ChartDependency[];
  readonly [field: string]: unknown;
}

/**
 * Computes `name-version`, the name helm gives to the archive of a chart release.
 */
export function fullyQualifiedName(metadata: {readonly name: string; readonly version: string}): string {
  return `${metadata.name}-${metadata.version}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a name or a version as written. An unquoted `1.10` is the number 1.1 once parsed, so numbers are taken
 * from the source text of their node.
 *
 * @param node - the scalar node, kept by the parsed document
 */
function readScalar(node: unknown): string | undefined {
  if (!yaml.isScalar(node)) {
    return undefined;
  }
  const value = node.value;
  if (typeof value === 'string' && value.trim() !== '') {
    return value;
  }
  if (typeof value === 'number') {
    return node.source ?? String(value);
  }
  return undefined;
}

function readDependency(
  document: yaml.Document.Parsed,
  value: unknown,
  index: number,
  manifestPath: string,
): ChartDependency {
  if (!isRecord(value)) {
    throw new InvalidManifestError(manifestPath, `dependency #${index} is not a mapping`);
  }
  const name = readScalar(document.getIn(['dependencies', index, 'name'], true));
  const version = readScalar(document.getIn(['dependencies', index, 'version'], true));
  if (name === undefined || version === undefined) {
    throw new InvalidManifestError(manifestPath, `dependency #${index} must have a name and a version`);
  }
  return {...value, name, version};
}

/**
 * Parses and validates the text of a chart manifest.
 *
 * @param text - YAML content of the manifest
 * @param manifestPath - path of the manifest, used in error messages
 * @throws InvalidManifestError when the content is not a mapping with a name, a version and a list of dependencies
 */
export function parseChartManifest(text: string, manifestPath: string): ChartManifest {
  const parsed = yaml.parseDocument(text);
  if (parsed.errors.length > 0) {
    throw new InvalidManifestError(manifestPath, 'not valid YAML', parsed.errors[0]);
  }

  const document: unknown = parsed.toJS();
  if (!isRecord(document)) {
    throw new InvalidManifestError(manifestPath, 'expected a mapping at the top level');
  }

  const name = readScalar(parsed.get('name', true));
  const version = readScalar(parsed.get('version', true));
  if (name === undefined) {
    throw new InvalidManifestError(manifestPath, 'missing name');
  }
  if (version === undefined) {
    throw new InvalidManifestError(manifestPath, 'missing version');
  }

  const rawDependencies = document.dependencies ?? [];
  if (!Array.isArray(rawDependencies)) {
    throw new InvalidManifestError(manifestPath, 'dependencies must be a list');
  }

  const dependencies = rawDependencies.map((dependency: unknown, index: number) =>
    readDependency(parsed, dependency, index, manifestPath),
  );

  return {...document, name, version, dependencies};
}

/**
 * Serializes a manifest back to YAML.
 */
export function stringifyChartManifest(manifest: ChartManifest): string {
  return yaml.stringify(manifest);
}
