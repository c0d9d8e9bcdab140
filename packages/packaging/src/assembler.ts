/**
 * Archive Assembler
 * 
 * Runs one assembly from inputs to a closed archive:
 * INIT → MANIFEST_BUILT → ARCHIVE_OPEN → MAIN_WRITTEN → DEPENDENCIES_WRITTEN
 *      → NATIVE_WRITTEN → TEMPLATE_MERGED → CLOSED
 * 
 * Any failure releases the output and template streams, removes the partial
 * output file and surfaces one error carrying the original cause.
 */

import { randomUUID } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
  AssemblyStateMachine,
  AttachmentError,
  ConfigurationError,
  describeError,
  toJarsmithError,
  type ArtifactAttacher,
  type AssemblyState,
  type AssemblyStateTransition,
  type DeclaredDependencySource,
  type DependencyResolver,
  type FileSetMatcher,
  type ManifestOverrides,
  type Namespace,
  type NativeLibrarySpec,
  type SourceFile,
} from '@jarsmith/core';
import {
  calculateFileHash,
  createLogger,
  ensureDir,
  getFileSizeBytes,
  removeFile,
  type Logger,
} from '@jarsmith/utils';
import { EntryWriter, type CollisionNaming, type WrittenEntry } from './entryWriter.js';
import { buildManifest } from './manifestSynthesizer.js';
import { SourceEnumerator, entryNameFor } from './sourceEnumerator.js';
import { mergeTemplate } from './templateMerger.js';

export interface AssemblyPorts {
  dependencyResolver: DependencyResolver;
  declaredDependencies: DeclaredDependencySource;
  fileSetMatcher: FileSetMatcher;
  artifactAttacher?: ArtifactAttacher;
}

export interface AssemblyRequest {
  primaryArtifact: string;
  outputPath: string;
  templateArchive: string;
  manifest: ManifestOverrides;
  nativeLibraries?: NativeLibrarySpec[];
  collisionNaming?: CollisionNaming;
  // Register the archive with the build under this classifier once it is closed
  attach?: { classifier: string };
}

export type EntryOrigin = 'manifest' | Namespace | 'template';

export interface AssembledEntry extends WrittenEntry {
  origin: EntryOrigin;
}

export interface AssemblyResult {
  runId: string;
  outputPath: string;
  sizeBytes: number;
  sha256: string;
  entries: AssembledEntry[];
  renamedCount: number;
  attachedClassifier: string | null;
  history: ReadonlyArray<AssemblyStateTransition>;
}

const NAMESPACE_STATES: ReadonlyArray<[Namespace, AssemblyState]> = [
  ['main', 'MAIN_WRITTEN'],
  ['lib', 'DEPENDENCIES_WRITTEN'],
  ['binlib', 'NATIVE_WRITTEN'],
];

export class ArchiveAssembler {
  private readonly log: Logger;

  constructor(
    private readonly ports: AssemblyPorts,
    logger?: Logger
  ) {
    this.log = logger ?? createLogger({ module: 'assembler' });
  }

  async assemble(request: AssemblyRequest): Promise<AssemblyResult> {
    const runId = randomUUID();
    const outputPath = resolve(request.outputPath);
    const machine = new AssemblyStateMachine(runId);
    const log = this.log.child({ runId, outputPath });
    const entries: AssembledEntry[] = [];
    let writer: EntryWriter | null = null;
    let renamedCount = 0;

    log.info({ primaryArtifact: request.primaryArtifact }, 'Assembly started');

    try {
      if (request.attach && !this.ports.artifactAttacher) {
        throw new ConfigurationError('Attachment requested but no artifact attacher is configured');
      }

      const sources = await this.enumerateSources(request, log);

      const manifest = await buildManifest(request.templateArchive, request.manifest);
      this.advance(machine, log, 'MANIFEST_BUILT');

      await ensureDir(dirname(outputPath));
      writer = await EntryWriter.open(outputPath, manifest, {
        collisionNaming: request.collisionNaming,
        logger: log,
      });
      entries.push(...writer.entries.map((entry) => ({ ...entry, origin: 'manifest' as const })));
      this.advance(machine, log, 'ARCHIVE_OPEN');

      for (const [namespace, state] of NAMESPACE_STATES) {
        const batch = sources.filter((source) => source.namespace === namespace);
        for (const source of batch) {
          const entry = await this.writeSource(writer, source);
          entries.push({ ...entry, origin: namespace });
        }
        this.advance(machine, log, state, { count: batch.length });
      }

      const templateEntries = await mergeTemplate(request.templateArchive, writer);
      entries.push(...templateEntries.map((entry) => ({ ...entry, origin: 'template' as const })));
      this.advance(machine, log, 'TEMPLATE_MERGED', { count: templateEntries.length });

      await writer.close();
      renamedCount = writer.renamedCount;
      this.advance(machine, log, 'CLOSED');
    } catch (error) {
      const failure = toJarsmithError(error, `Assembly of ${outputPath} failed`);
      if (writer) {
        await this.discardOutput(writer, log);
      }
      machine.fail(failure.message, { code: failure.code });
      log.error({ code: failure.code, error: failure.message }, 'Assembly failed');
      throw failure;
    }

    let attachedClassifier: string | null = null;
    if (request.attach && this.ports.artifactAttacher) {
      const { classifier } = request.attach;
      try {
        await this.ports.artifactAttacher.attach(outputPath, classifier);
      } catch (error) {
        const failure = new AttachmentError(outputPath, classifier, error);
        machine.fail(failure.message, { code: failure.code });
        log.error({ classifier, error: describeError(error) }, 'Attachment failed');
        throw failure;
      }
      attachedClassifier = classifier;
      log.info({ classifier }, 'Archive attached to build');
    }

    const result: AssemblyResult = {
      runId,
      outputPath,
      sizeBytes: await getFileSizeBytes(outputPath),
      sha256: await calculateFileHash(outputPath, 'sha256'),
      entries,
      renamedCount,
      attachedClassifier,
      history: machine.getHistory(),
    };

    log.info({
      entries: result.entries.length,
      renamed: result.renamedCount,
      sizeBytes: result.sizeBytes,
    }, 'Assembly complete');

    return result;
  }

  private async enumerateSources(request: AssemblyRequest, log: Logger): Promise<SourceFile[]> {
    const resolvedArtifacts = await this.ports.dependencyResolver.resolveArtifacts();
    const declaredDependencies = await this.ports.declaredDependencies.listDeclaredDependencies();
    const enumerator = new SourceEnumerator(this.ports.fileSetMatcher, log);

    return enumerator.enumerate({
      primaryArtifact: request.primaryArtifact,
      resolvedArtifacts,
      declaredDependencies,
      nativeLibraries: request.nativeLibraries ?? [],
    });
  }

  private async writeSource(writer: EntryWriter, source: SourceFile): Promise<WrittenEntry> {
    const stream = createReadStream(source.path);
    try {
      return await writer.write(entryNameFor(source), stream);
    } finally {
      stream.destroy();
    }
  }

  private advance(
    machine: AssemblyStateMachine,
    log: Logger,
    state: AssemblyState,
    metadata?: Record<string, unknown>
  ): void {
    const transition = machine.transitionTo(state, undefined, metadata);
    log.debug({ from: transition.from, to: transition.to, ...metadata }, 'Assembly state changed');
  }

  /**
   * Release the output stream and delete the half-written file.
   * Failures here are logged so the original error is the one reported.
   */
  private async discardOutput(writer: EntryWriter, log: Logger): Promise<void> {
    try {
      await writer.abort();
    } catch (error) {
      log.warn({ error: describeError(error) }, 'Failed to release output stream');
    }
    try {
      await removeFile(writer.outputPath);
    } catch (error) {
      log.warn({ error: describeError(error) }, 'Failed to remove partial output');
    }
  }
}
