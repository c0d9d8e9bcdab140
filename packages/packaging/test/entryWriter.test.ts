import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { strToU8 } from 'fflate';
import { IoFailureError } from '@jarsmith/core';
import { EntryWriter } from '../src/entryWriter.js';
import { Manifest } from '../src/manifest.js';
import { createWorkspace, readZip, type Workspace } from './helpers.js';

function minimalManifest(): Manifest {
  const manifest = new Manifest();
  manifest.mainAttributes.set('Manifest-Version', '1.0');
  return manifest;
}

describe('EntryWriter', () => {
  let workspace: Workspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  afterEach(async () => {
    vi.useRealTimers();
    await workspace.cleanup();
  });

  it('writes the manifest as the first entry', async () => {
    const outputPath = workspace.path('out.jar');
    const writer = await EntryWriter.open(outputPath, minimalManifest());
    await writer.close();

    const entries = await readZip(outputPath);
    expect([...entries.keys()]).toEqual(['META-INF/MANIFEST.MF']);
    expect(entries.get('META-INF/MANIFEST.MF')).toBe('Manifest-Version: 1.0\r\n\r\n');
  });

  it('renames taken names with a counter shared by the whole archive', async () => {
    const outputPath = workspace.path('out.jar');
    const writer = await EntryWriter.open(outputPath, minimalManifest());

    await writer.write('lib/a.jar', strToU8('first'));
    const second = await writer.write('lib/a.jar', strToU8('second'));
    await writer.write('LICENSE', strToU8('x'));
    await writer.write('LICENSE', strToU8('y'));
    await writer.write('lib/a.jar', strToU8('third'));
    await writer.close();

    expect(second).toEqual({
      name: 'lib/a.jar-DUPLICATE-FILENAME-1.jar',
      requestedName: 'lib/a.jar',
      size: 6,
      renamed: true,
    });
    expect(writer.renamedCount).toBe(3);

    const entries = await readZip(outputPath);
    expect([...entries]).toEqual([
      ['META-INF/MANIFEST.MF', 'Manifest-Version: 1.0\r\n\r\n'],
      ['lib/a.jar', 'first'],
      ['lib/a.jar-DUPLICATE-FILENAME-1.jar', 'second'],
      ['LICENSE', 'x'],
      ['LICENSE-DUPLICATE-FILENAME-2', 'y'],
      ['lib/a.jar-DUPLICATE-FILENAME-3.jar', 'third'],
    ]);
  });

  it('uses the .jar suffix for every rename in legacy mode', async () => {
    const outputPath = workspace.path('out.jar');
    const writer = await EntryWriter.open(outputPath, minimalManifest(), { collisionNaming: 'legacy' });

    await writer.write('binlib/libfoo.so', strToU8('a'));
    const renamed = await writer.write('binlib/libfoo.so', strToU8('b'));
    await writer.close();

    expect(renamed.name).toBe('binlib/libfoo.so-DUPLICATE-FILENAME-1.jar');
  });

  it('skips counter values whose names are already taken', async () => {
    const outputPath = workspace.path('out.jar');
    const writer = await EntryWriter.open(outputPath, minimalManifest());

    await writer.write('a.txt', strToU8('1'));
    await writer.write('a.txt-DUPLICATE-FILENAME-1.txt', strToU8('2'));
    const renamed = await writer.write('a.txt', strToU8('3'));
    await writer.close();

    expect(renamed.name).toBe('a.txt-DUPLICATE-FILENAME-2.txt');
    expect(writer.renamedCount).toBe(1);
  });

  it('writes identical bytes whatever the current time', async () => {
    async function writeArchive(path: string, now: string): Promise<Buffer> {
      vi.setSystemTime(new Date(now));
      const writer = await EntryWriter.open(path, minimalManifest());
      await writer.write('boot/', new Uint8Array(0));
      await writer.write('lib/a.jar', strToU8('content'));
      await writer.close();
      return readFile(path);
    }
    vi.useFakeTimers({ toFake: ['Date'] });

    const first = await writeArchive(workspace.path('first.jar'), '2021-03-04T05:06:07Z');
    const second = await writeArchive(workspace.path('second.jar'), '2033-08-09T10:11:12Z');

    expect(second.equals(first)).toBe(true);
  });

  it('consumes stream content to its end', async () => {
    const outputPath = workspace.path('out.jar');
    const writer = await EntryWriter.open(outputPath, minimalManifest());

    const chunked = await writer.write('main/app.jar', Readable.from([Buffer.from('ab'), Buffer.from('cd')]));
    const empty = await writer.write('main/empty.jar', Readable.from([]));
    await writer.close();

    expect(chunked.size).toBe(4);
    expect(empty.size).toBe(0);
    const entries = await readZip(outputPath);
    expect(entries.get('main/app.jar')).toBe('abcd');
    expect(entries.get('main/empty.jar')).toBe('');
  });

  it('reports a failing source stream as an I/O failure', async () => {
    const outputPath = workspace.path('out.jar');
    const writer = await EntryWriter.open(outputPath, minimalManifest());
    const failing = new Readable({
      read() {
        this.destroy(new Error('disk gone'));
      },
    });

    await expect(writer.write('lib/broken.jar', failing)).rejects.toThrow(
      'Failed to write entry lib/broken.jar: disk gone'
    );
    await writer.abort();
  });

  it('refuses writes after close', async () => {
    const outputPath = workspace.path('out.jar');
    const writer = await EntryWriter.open(outputPath, minimalManifest());
    await writer.close();
    await writer.close();

    await expect(writer.write('late.txt', strToU8('x'))).rejects.toBeInstanceOf(IoFailureError);
  });

  it('fails to open an output in a missing directory', async () => {
    const outputPath = workspace.path('missing', 'out.jar');

    await expect(EntryWriter.open(outputPath, minimalManifest())).rejects.toBeInstanceOf(IoFailureError);
    expect(existsSync(outputPath)).toBe(false);
  });
});
