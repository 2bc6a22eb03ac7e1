// SPDX-License-Identifier: Apache-2.0

import * as yaml from 'yaml';
import {type ArchiveCodec} from '../../../src/core/archive/archive-codec.js';
import {type ChartPackager, type PackageableChart} from '../../../src/core/chart/chart-packager.js';
import {createResolverConfig, type ResolverConfig} from '../../../src/core/config/resolver-config.js';
import {ExtractFailureError} from '../../../src/core/errors/extract-failure-error.js';
import {PathEx} from '../../../src/business/utils/path-ex.js';
import {type InMemoryChartFileSystem} from './in-memory-chart-file-system.fixture.js';

export interface ChartDefinition {
  name: string;
  version: string;
  dependencies?: {name: string; version: string; repository?: string}[];
  /** extra files, keyed by path relative to the chart root */
  files?: Record<string, string>;
}

interface ArchivePayload {
  root: string;
  entries: Record<string, string | null>;
}

function isArchivePayload(value: unknown): value is ArchivePayload {
  return typeof value === 'object' && value !== null && 'root' in value && 'entries' in value;
}

export function manifestText(definition: ChartDefinition): string {
  const manifest: Record<string, unknown> = {apiVersion: 'v2', name: definition.name, version: definition.version};
  if (definition.dependencies) {
    manifest.dependencies = definition.dependencies;
  }
  return yaml.stringify(manifest);
}

/** The entries of a chart directory, keyed by path relative to the chart root */
export function chartEntries(definition: ChartDefinition): Record<string, string> {
  return {'Chart.yaml': manifestText(definition), ...definition.files};
}

/** Lays out a chart directory */
export function writeChart(fileSystem: InMemoryChartFileSystem, location: string, definition: ChartDefinition): void {
  fileSystem.makeDirectory(location);
  for (const [path, content] of Object.entries(chartEntries(definition))) {
    fileSystem.writeFile(PathEx.join(location, path), content);
  }
}

/**
 * Builds the content of an archive holding one chart directory
 *
 * @param definition - the chart
 * @param nested - subcharts in directory form, laid out in the charts directory of the archive
 */
export function chartArchive(definition: ChartDefinition, nested: ChartDefinition[] = []): string {
  const entries: Record<string, string | null> = {...chartEntries(definition)};
  for (const subchart of nested) {
    for (const [path, content] of Object.entries(chartEntries(subchart))) {
      entries[`charts/${subchart.name}/${path}`] = content;
    }
  }
  return JSON.stringify({root: definition.name, entries});
}

/** Reads back an archive written by the in-memory packager or by chartArchive */
export function readArchive(text: string): ArchivePayload {
  const payload: unknown = JSON.parse(text);
  if (!isArchivePayload(payload)) {
    throw new Error('not an in-memory archive');
  }
  return payload;
}

export class InMemoryArchiveCodec implements ArchiveCodec {
  public readonly extracted: string[] = [];

  public constructor(private readonly fileSystem: InMemoryChartFileSystem) {}

  public async extract(archivePath: string, destinationDirectory: string): Promise<string> {
    if (this.fileSystem.exists(destinationDirectory)) {
      throw new ExtractFailureError(archivePath, `${destinationDirectory} already exists`);
    }
    let payload: ArchivePayload;
    try {
      payload = readArchive(this.fileSystem.readText(archivePath));
    } catch (error) {
      throw new ExtractFailureError(archivePath, 'unreadable archive', error);
    }

    const root = PathEx.join(destinationDirectory, payload.root);
    this.fileSystem.makeDirectory(root);
    for (const [path, content] of Object.entries(payload.entries)) {
      if (content === null) {
        this.fileSystem.makeDirectory(PathEx.join(root, path));
      } else {
        this.fileSystem.writeFile(PathEx.join(root, path), content);
      }
    }
    this.extracted.push(archivePath);
    return root;
  }
}

export class InMemoryChartPackager implements ChartPackager {
  public readonly packaged: {location: string; archivePath: string}[] = [];

  public constructor(
    private readonly fileSystem: InMemoryChartFileSystem,
    private readonly config: ResolverConfig = createResolverConfig(),
  ) {}

  public async package(chart: PackageableChart, destinationDirectory: string): Promise<string> {
    const archivePath = PathEx.join(destinationDirectory, `${chart.fullyQualifiedName}${this.config.archiveExtension}`);
    const content = JSON.stringify({
      root: PathEx.basename(chart.location),
      entries: this.fileSystem.snapshot(chart.location),
    });
    this.fileSystem.makeDirectory(destinationDirectory);
    this.fileSystem.writeText(archivePath, content);
    this.packaged.push({location: chart.location, archivePath});
    return archivePath;
  }
}
