import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { strToU8 } from 'fflate';
import { EntryWriter } from '../src/entryWriter.js';
import { Manifest } from '../src/manifest.js';
import { mergeTemplate } from '../src/templateMerger.js';
import { createWorkspace, readZip, writeTemplate, type Workspace } from './helpers.js';

describe('mergeTemplate', () => {
  let workspace: Workspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('copies every template entry except its manifest, in template order', async () => {
    const template = await writeTemplate(workspace.path('template.jar'), {
      'boot/': '',
      'lib/a.jar': 'template-copy',
    });
    const outputPath = workspace.path('out.jar');
    const manifest = new Manifest();
    manifest.mainAttributes.set('Manifest-Version', '1.0');
    manifest.mainAttributes.set('One-Jar-Main-Class', 'com.example.App');

    const writer = await EntryWriter.open(outputPath, manifest);
    await writer.write('lib/a.jar', strToU8('dependency'));
    const merged = await mergeTemplate(template, writer);
    await writer.close();

    expect(merged.map((entry) => entry.name)).toEqual([
      'boot/Loader.class',
      'boot/',
      'lib/a.jar-DUPLICATE-FILENAME-1.jar',
    ]);

    const entries = await readZip(outputPath);
    expect([...entries]).toEqual([
      ['META-INF/MANIFEST.MF', 'Manifest-Version: 1.0\r\nOne-Jar-Main-Class: com.example.App\r\n\r\n'],
      ['lib/a.jar', 'dependency'],
      ['boot/Loader.class', 'loader-bytes'],
      ['boot/', ''],
      ['lib/a.jar-DUPLICATE-FILENAME-1.jar', 'template-copy'],
    ]);
  });
});
