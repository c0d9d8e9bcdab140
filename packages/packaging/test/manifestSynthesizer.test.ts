import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '@jarsmith/core';
import { buildManifest } from '../src/manifestSynthesizer.js';
import { createWorkspace, writeTemplate, writeZip, type Workspace } from './helpers.js';

describe('buildManifest', () => {
  let workspace: Workspace;

  beforeEach(async () => {
    workspace = await createWorkspace();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  it('adds the main class and implementation version to the template manifest', async () => {
    const template = await writeTemplate(workspace.path('template.jar'));

    const manifest = await buildManifest(template, {
      mainClass: 'com.example.App',
      implementationVersion: '2.1.0',
    });

    expect([...manifest.mainAttributes]).toEqual([
      ['Manifest-Version', '1.0'],
      ['Created-By', 'jarsmith-tests'],
      ['Main-Class', 'boot.Loader'],
      ['One-Jar-Main-Class', 'com.example.App'],
      ['Implementation-Version', '2.1.0'],
    ]);
  });

  it('replaces template values in place and leaves the main class alone when none is given', async () => {
    const template = await writeZip(workspace.path('template.jar'), {
      'META-INF/MANIFEST.MF':
        'Manifest-Version: 1.0\r\nImplementation-Version: 0.0.1\r\nOne-Jar-Main-Class: template.Main\r\n\r\n',
    });

    const manifest = await buildManifest(template, { implementationVersion: '3.0.0' });

    expect([...manifest.mainAttributes]).toEqual([
      ['Manifest-Version', '1.0'],
      ['Implementation-Version', '3.0.0'],
      ['One-Jar-Main-Class', 'template.Main'],
    ]);
  });

  it('finds the manifest wherever it sits in the template', async () => {
    const template = await writeZip(workspace.path('template.jar'), {
      'boot/Loader.class': 'loader-bytes',
      'META-INF/MANIFEST.MF': 'Manifest-Version: 1.0\r\n\r\n',
    });

    const manifest = await buildManifest(template, { implementationVersion: '1.0.0' });

    expect(manifest.mainAttributes.get('Manifest-Version')).toBe('1.0');
  });

  it('rejects a template without a manifest', async () => {
    const template = await writeZip(workspace.path('template.jar'), {
      'boot/Loader.class': 'loader-bytes',
    });

    await expect(buildManifest(template, { implementationVersion: '1.0.0' })).rejects.toThrow(
      `Template archive ${template} does not contain META-INF/MANIFEST.MF`
    );
    await expect(buildManifest(template, { implementationVersion: '1.0.0' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
