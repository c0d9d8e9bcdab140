/**
 * Archive Reader
 * 
 * Streams the entries of a zip archive in archive order.
 * The file is read through one stream that is destroyed on every exit path,
 * including a consumer that stops iterating early.
 */

import { createReadStream } from 'node:fs';
import { Unzip, UnzipInflate } from 'fflate';
import { IoFailureError, JarsmithError, describeError } from '@jarsmith/core';

export interface ArchiveEntry {
  name: string;
  content: Uint8Array;
}

export async function* readArchiveEntries(archivePath: string): AsyncGenerator<ArchiveEntry> {
  const stream = createReadStream(archivePath);
  const completed: ArchiveEntry[] = [];
  const failures: Error[] = [];

  const unzip = new Unzip((file) => {
    const chunks: Uint8Array[] = [];
    file.ondata = (error, data, final) => {
      if (error) {
        failures.push(error);
        return;
      }
      chunks.push(data);
      if (final) {
        completed.push({ name: file.name, content: Buffer.concat(chunks) });
      }
    };
    file.start();
  });
  unzip.register(UnzipInflate);

  const takeCompleted = (): ArchiveEntry[] => {
    const [failure] = failures;
    if (failure) {
      throw failure;
    }
    return completed.splice(0, completed.length);
  };

  try {
    for await (const chunk of stream) {
      unzip.push(chunk);
      yield* takeCompleted();
    }
    unzip.push(new Uint8Array(0), true);
    yield* takeCompleted();
  } catch (error) {
    if (error instanceof JarsmithError) {
      throw error;
    }
    throw new IoFailureError(
      `Failed to read archive ${archivePath}: ${describeError(error)}`,
      { archivePath },
      error
    );
  } finally {
    stream.destroy();
  }
}
