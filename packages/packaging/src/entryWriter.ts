/**
 * Entry Writer
 * 
 * Owns the output archive stream. Every accepted (name, content) pair becomes
 * exactly one entry; a name that is already taken is renamed to
 * `<name>-DUPLICATE-FILENAME-<n><suffix>` with a counter private to this writer.
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import { Zip, ZipDeflate, ZipPassThrough } from 'fflate';
import { IoFailureError, describeError } from '@jarsmith/core';
import { createLogger, getEntryExtension, isDirectoryEntryName, type Logger } from '@jarsmith/utils';
import {
  COLLISION_MARKER,
  DEFLATE_LEVEL,
  ENTRY_MTIME,
  LEGACY_COLLISION_SUFFIX,
  MANIFEST_NAME,
} from './constants.js';
import { serializeManifest, type Manifest } from './manifest.js';

export type EntryContent = Uint8Array | AsyncIterable<Uint8Array>;

/**
 * `preserve-extension` suffixes a renamed entry with its own extension,
 * `legacy` always uses `.jar`
 */
export type CollisionNaming = 'preserve-extension' | 'legacy';

export interface EntryWriterOptions {
  collisionNaming?: CollisionNaming;
  logger?: Logger;
}

export interface WrittenEntry {
  name: string;
  requestedName: string;
  size: number;
  renamed: boolean;
}

const EMPTY_CHUNK = new Uint8Array(0);

export class EntryWriter {
  private readonly zip: Zip;
  private readonly entryNames = new Set<string>();
  private readonly written: WrittenEntry[] = [];
  private readonly collisionNaming: CollisionNaming;
  private readonly log: Logger;
  private collisionCounter = 0;
  private streamFailure: Error | null = null;
  private closed = false;

  private constructor(
    readonly outputPath: string,
    private readonly out: WriteStream,
    options: EntryWriterOptions
  ) {
    this.collisionNaming = options.collisionNaming ?? 'preserve-extension';
    this.log = options.logger ?? createLogger({ module: 'entry-writer' });

    this.out.on('error', (error) => {
      this.streamFailure ??= error;
    });
    this.zip = new Zip((error, chunk, final) => {
      if (error) {
        this.streamFailure ??= error;
        return;
      }
      this.out.write(chunk);
      if (final) {
        this.out.end();
      }
    });
  }

  /**
   * Create the output file and write the manifest as its first entry
   */
  static async open(
    outputPath: string,
    manifest: Manifest,
    options: EntryWriterOptions = {}
  ): Promise<EntryWriter> {
    const out = createWriteStream(outputPath);
    try {
      await once(out, 'open');
    } catch (error) {
      throw new IoFailureError(
        `Cannot open ${outputPath} for writing: ${describeError(error)}`,
        { outputPath },
        error
      );
    }

    const writer = new EntryWriter(outputPath, out, options);
    try {
      await writer.write(MANIFEST_NAME, serializeManifest(manifest));
    } catch (error) {
      await writer.abort();
      throw error;
    }
    return writer;
  }

  get entries(): ReadonlyArray<WrittenEntry> {
    return [...this.written];
  }

  get renamedCount(): number {
    return this.written.filter((entry) => entry.renamed).length;
  }

  /**
   * Append one entry, renaming it if the name is taken.
   * Stream content is consumed to its end.
   */
  async write(name: string, content: EntryContent): Promise<WrittenEntry> {
    this.assertWritable();

    const entryName = this.claimName(name);
    const file = isDirectoryEntryName(entryName)
      ? new ZipPassThrough(entryName)
      : new ZipDeflate(entryName, { level: DEFLATE_LEVEL });
    file.mtime = ENTRY_MTIME;
    this.zip.add(file);

    let size = 0;
    try {
      if (content instanceof Uint8Array) {
        size = content.length;
        file.push(content, true);
      } else {
        for await (const chunk of content) {
          size += chunk.length;
          file.push(chunk);
          await this.drain();
        }
        file.push(EMPTY_CHUNK, true);
      }
      await this.drain();
    } catch (error) {
      this.streamFailure ??= error instanceof Error ? error : new Error(describeError(error));
      throw new IoFailureError(
        `Failed to write entry ${entryName}: ${describeError(error)}`,
        { entryName, outputPath: this.outputPath },
        error
      );
    }

    const entry: WrittenEntry = {
      name: entryName,
      requestedName: name,
      size,
      renamed: entryName !== name,
    };
    this.written.push(entry);
    return entry;
  }

  /**
   * Finish the archive and release the file handle. Only the first call has an effect.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      this.throwIfFailed();
      this.zip.end();
      await finished(this.out);
    } catch (error) {
      this.out.destroy();
      if (error instanceof IoFailureError) {
        throw error;
      }
      throw new IoFailureError(
        `Failed to finish archive ${this.outputPath}: ${describeError(error)}`,
        { outputPath: this.outputPath },
        error
      );
    }
  }

  /**
   * Drop the archive without finishing it and release the file handle
   */
  async abort(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    this.zip.terminate();
    if (!this.out.closed) {
      const closing = once(this.out, 'close');
      this.out.destroy();
      await closing;
    }
  }

  private claimName(name: string): string {
    let candidate = name;
    while (this.entryNames.has(candidate)) {
      candidate = this.alternativeName(name);
    }
    if (candidate !== name) {
      this.log.info({ entry: name, renamedTo: candidate }, 'Duplicate entry renamed');
    }
    this.entryNames.add(candidate);
    return candidate;
  }

  private alternativeName(name: string): string {
    this.collisionCounter += 1;
    const suffix = this.collisionNaming === 'legacy'
      ? LEGACY_COLLISION_SUFFIX
      : getEntryExtension(name);
    return `${name}${COLLISION_MARKER}${this.collisionCounter}${suffix}`;
  }

  private async drain(): Promise<void> {
    this.throwIfFailed();
    if (this.out.writableNeedDrain) {
      await once(this.out, 'drain');
    }
  }

  private assertWritable(): void {
    if (this.closed) {
      throw new IoFailureError(`Archive ${this.outputPath} is already closed`, {
        outputPath: this.outputPath,
      });
    }
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.streamFailure) {
      throw new IoFailureError(
        `Failed to write archive ${this.outputPath}: ${this.streamFailure.message}`,
        { outputPath: this.outputPath },
        this.streamFailure
      );
    }
  }
}
