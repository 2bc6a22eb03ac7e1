// SPDX-License-Identifier: Apache-2.0

import {PathEx} from '../../business/utils/path-ex.js';
import {MissingManifestError} from '../errors/missing-manifest-error.js';
import {type ResolverConfig} from '../config/resolver-config.js';
import {type ChartFileSystem} from '../fs/chart-file-system.js';
import {type ArchiveCodec} from '../archive/archive-codec.js';
import {type ChartPackager} from './chart-packager.js';
import {
  type ChartDependency,
  type ChartManifest,
  fullyQualifiedName,
  parseChartManifest,
} from './chart-manifest.js';
import {type SubchartEntry} from './subchart-entry.js';

/**
 * The collaborators a chart delegates its side effects to.
 */
export interface ChartEnvironment {
  readonly fileSystem: ChartFileSystem;
  readonly archiveCodec: ArchiveCodec;
  readonly packager: ChartPackager;
  readonly config: ResolverConfig;
}

/**
 * Read-only view of a chart directory. Reload the chart to observe changes made on disk.
 */
export class Chart {
  public readonly name: string;
  public readonly version: string;
  public readonly fullyQualifiedName: string;
  public readonly dependencies: readonly ChartDependency[];
  public readonly dependencyFullNames: readonly string[];
  public readonly subchartsDir: string;

  private constructor(
    public readonly location: string,
    public readonly manifest: ChartManifest,
    private readonly environment: ChartEnvironment,
  ) {
    this.name = manifest.name;
    this.version = manifest.version;
    this.fullyQualifiedName = fullyQualifiedName(manifest);
    this.dependencies = manifest.dependencies ?? [];
    this.dependencyFullNames = this.dependencies.map(dependency => fullyQualifiedName(dependency));
    this.subchartsDir = PathEx.join(location, environment.config.subchartsDirectoryName);
  }

  /**
   * @param location - a chart directory, relative paths are resolved against the working directory
   * @param environment - the collaborators of the chart
   * @throws MissingManifestError when the directory has no manifest
   * @throws InvalidManifestError when the manifest cannot be read as a chart manifest
   */
  public static load(location: string, environment: ChartEnvironment): Chart {
    const resolvedLocation = PathEx.resolve(location);
    const manifestFile = environment.config.manifestFileName;
    const manifestPath = PathEx.join(resolvedLocation, manifestFile);
    if (!environment.fileSystem.isFile(manifestPath)) {
      throw new MissingManifestError(resolvedLocation, manifestFile);
    }

    const manifest = parseChartManifest(environment.fileSystem.readText(manifestPath), manifestPath);
    return new Chart(resolvedLocation, manifest, environment);
  }

  /**
   * Check whether name is fulfilling a dependency of mine.
   *
   * It can either be the exact name of a dependency, or a prefix of a dependency. This allows dependencies like
   * some-dep-dev to be fulfilled by the name some-dep.
   *
   * @param name - a fully qualified name
   * @returns the fully qualified names of the dependencies the name fulfills
   */
  public matchToDependencies(name: string): string[] {
    return this.dependencyFullNames.filter(dependency => dependency.startsWith(name));
  }

  public archiveFileName(fullName: string): string {
    return `${fullName}${this.environment.config.archiveExtension}`;
  }

  /**
   * Where the archive of a dependency lives once resolved.
   */
  public archivePath(fullName: string): string {
    return PathEx.join(this.subchartsDir, this.archiveFileName(fullName));
  }

  /**
   * A copy of my manifest listing only the given dependencies.
   */
  public partialManifest(dependencies: readonly ChartDependency[]): ChartManifest {
    return {...structuredClone(this.manifest), dependencies: structuredClone([...dependencies])};
  }

  /**
   * Package my content into the given directory.
   *
   * @returns path of the written archive
   */
  public async package(destinationDirectory: string): Promise<string> {
    return this.environment.packager.package(this, destinationDirectory);
  }

  /**
   * Extracts an archive, typically one of my subcharts.
   *
   * @returns path of the extracted chart root
   */
  public async extract(archivePath: string, destinationDirectory: string): Promise<string> {
    return this.environment.archiveCodec.extract(archivePath, destinationDirectory);
  }

  /**
   * Classifies the content of my subcharts directory, sorted by name. Empty when the directory does not exist.
   */
  public subchartEntries(): SubchartEntry[] {
    const {fileSystem, config} = this.environment;
    if (!fileSystem.isDirectory(this.subchartsDir)) {
      return [];
    }

    return fileSystem.list(this.subchartsDir).map((name): SubchartEntry => {
      const path = PathEx.join(this.subchartsDir, name);
      if (fileSystem.isDirectory(path)) {
        return {kind: 'directory', name, path};
      }
      if (name.endsWith(config.archiveExtension) && fileSystem.isFile(path)) {
        return {kind: 'archive', name, path, fullyQualifiedName: name.slice(0, -config.archiveExtension.length)};
      }
      return {kind: 'other', name, path};
    });
  }

  public toString(): string {
    return `<Chart('${this.location}')>`;
  }
}
