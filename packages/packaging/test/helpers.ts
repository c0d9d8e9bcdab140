import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { strFromU8, strToU8, unzipSync, zipSync } from 'fflate';

export const TEMPLATE_MANIFEST =
  'Manifest-Version: 1.0\r\nCreated-By: jarsmith-tests\r\nMain-Class: boot.Loader\r\n\r\n';

export interface Workspace {
  root: string;
  path(...segments: string[]): string;
  cleanup(): Promise<void>;
}

export async function createWorkspace(): Promise<Workspace> {
  const root = await mkdtemp(join(tmpdir(), 'jarsmith-'));
  return {
    root,
    path: (...segments) => join(root, ...segments),
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

export async function writeText(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
  return path;
}

/**
 * Write a zip whose entries appear in the key order of `files`
 */
export async function writeZip(path: string, files: Record<string, string>): Promise<string> {
  const entries: Record<string, Uint8Array> = {};
  for (const [name, content] of Object.entries(files)) {
    entries[name] = strToU8(content);
  }
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, zipSync(entries));
  return path;
}

export async function writeTemplate(path: string, extraEntries: Record<string, string> = {}): Promise<string> {
  return writeZip(path, {
    'META-INF/MANIFEST.MF': TEMPLATE_MANIFEST,
    'boot/Loader.class': 'loader-bytes',
    ...extraEntries,
  });
}

/**
 * Entries of a zip in archive order, decoded as text
 */
export async function readZip(path: string): Promise<Map<string, string>> {
  const files = unzipSync(await readFile(path));
  return new Map(Object.entries(files).map(([name, data]) => [name, strFromU8(data)]));
}
