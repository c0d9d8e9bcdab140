/**
 * Source Enumerator
 * 
 * Turns the build's inputs into the ordered list of files to embed:
 * primary artifact, resolved dependencies, system-scope dependencies,
 * then native libraries.
 */

import { basename, resolve } from 'node:path';
import {
  ConfigurationError,
  IoFailureError,
  type DeclaredDependency,
  type FileSetMatcher,
  type Namespace,
  type NativeLibrarySpec,
  type ResolvedArtifact,
  type SourceFile,
} from '@jarsmith/core';
import { createLogger, isRegularFile, joinEntryPath, type Logger } from '@jarsmith/utils';

const SYSTEM_SCOPE = 'system';

export interface EnumerationInput {
  primaryArtifact: string;
  resolvedArtifacts: ResolvedArtifact[];
  declaredDependencies: DeclaredDependency[];
  nativeLibraries: NativeLibrarySpec[];
}

export function toSourceFile(path: string, namespace: Namespace): SourceFile {
  const absolutePath = resolve(path);
  return { path: absolutePath, namespace, fileName: basename(absolutePath) };
}

export function entryNameFor(source: SourceFile): string {
  return joinEntryPath(source.namespace, source.fileName);
}

export class SourceEnumerator {
  private readonly log: Logger;

  constructor(
    private readonly fileSetMatcher: FileSetMatcher,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger({ module: 'source-enumerator' });
  }

  async enumerate(input: EnumerationInput): Promise<SourceFile[]> {
    const sources: SourceFile[] = [await this.primarySource(input.primaryArtifact)];

    for (const artifact of input.resolvedArtifacts) {
      if (artifact.file !== undefined && await isRegularFile(artifact.file)) {
        sources.push(toSourceFile(artifact.file, 'lib'));
      } else {
        this.log.debug({ artifact: artifact.id ?? artifact.file }, 'Skipping artifact without a file');
      }
    }

    for (const dependency of input.declaredDependencies) {
      if (dependency.scope === SYSTEM_SCOPE) {
        sources.push(await this.systemSource(dependency));
      }
    }

    for (const spec of input.nativeLibraries) {
      const files = await this.fileSetMatcher.match(spec);
      this.log.debug({ directory: spec.directory, matched: files.length }, 'Native library file-set expanded');
      for (const file of files) {
        sources.push(toSourceFile(file, 'binlib'));
      }
    }

    return sources;
  }

  private async primarySource(path: string): Promise<SourceFile> {
    if (!(await isRegularFile(path))) {
      throw new IoFailureError(`Primary artifact not found: ${path}`, { path });
    }
    return toSourceFile(path, 'main');
  }

  private async systemSource(dependency: DeclaredDependency): Promise<SourceFile> {
    const { systemPath } = dependency;
    if (systemPath === undefined || systemPath.trim() === '') {
      throw new ConfigurationError(
        `System-scope dependency ${dependency.id ?? '(unnamed)'} has no systemPath`,
        { dependency: dependency.id }
      );
    }
    if (!(await isRegularFile(systemPath))) {
      throw new IoFailureError(
        `System-scope dependency not found at ${systemPath}`,
        { dependency: dependency.id, systemPath }
      );
    }
    return toSourceFile(systemPath, 'lib');
  }
}
