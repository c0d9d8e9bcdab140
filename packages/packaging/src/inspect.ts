/**
 * Archive Inspection
 */

import { readArchiveEntries } from './archiveReader.js';
import { MANIFEST_NAME } from './constants.js';
import { parseManifest, type Manifest } from './manifest.js';

export interface InspectedEntry {
  name: string;
  size: number;
}

export interface ArchiveInspection {
  path: string;
  entries: InspectedEntry[];
  manifest: Manifest | null;
}

/**
 * List entries in archive order and parse the manifest, if there is one
 */
export async function inspectArchive(path: string): Promise<ArchiveInspection> {
  const entries: InspectedEntry[] = [];
  let manifest: Manifest | null = null;

  for await (const entry of readArchiveEntries(path)) {
    entries.push({ name: entry.name, size: entry.content.length });
    if (entry.name === MANIFEST_NAME) {
      manifest = parseManifest(entry.content);
    }
  }

  return { path, entries, manifest };
}
