/**
 * Template Merger
 * 
 * Copies the bootstrap template into the output, all but its manifest,
 * which the writer already placed at the head of the archive.
 */

import { readArchiveEntries } from './archiveReader.js';
import { MANIFEST_NAME } from './constants.js';
import type { EntryWriter, WrittenEntry } from './entryWriter.js';

export async function mergeTemplate(
  templateArchive: string,
  writer: EntryWriter
): Promise<WrittenEntry[]> {
  const merged: WrittenEntry[] = [];
  for await (const entry of readArchiveEntries(templateArchive)) {
    if (entry.name === MANIFEST_NAME) {
      continue;
    }
    merged.push(await writer.write(entry.name, entry.content));
  }
  return merged;
}
