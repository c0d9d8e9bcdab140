import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '@jarsmith/core';
import { loadDescriptor, parseDescriptor } from '../src/lib/descriptor.js';

describe('parseDescriptor', () => {
  it('applies defaults and resolves paths against the base directory', () => {
    const descriptor = parseDescriptor(
      {
        project: { name: 'demo', version: '1.0.0' },
        artifact: 'target/demo-1.0.0.jar',
        resolvedArtifacts: [{ id: 'lib-a', file: 'repo/lib-a.jar' }, { id: 'pom-only' }],
        dependencies: [{ id: 'vendor', scope: 'system', systemPath: 'vendor/sdk.jar' }, { id: 'lib-a' }],
        binlibs: [{ directory: 'native' }],
      },
      '/work/demo'
    );

    expect(descriptor).toEqual({
      project: { name: 'demo', version: '1.0.0', buildDirectory: '/work/demo/target' },
      artifact: '/work/demo/target/demo-1.0.0.jar',
      resolvedArtifacts: [
        { id: 'lib-a', file: '/work/demo/repo/lib-a.jar' },
        { id: 'pom-only', file: undefined },
      ],
      dependencies: [
        { id: 'vendor', scope: 'system', systemPath: '/work/demo/vendor/sdk.jar' },
        { id: 'lib-a', scope: 'compile', systemPath: undefined },
      ],
      binlibs: [{ directory: '/work/demo/native', includes: [], excludes: [] }],
      onejar: {
        attachToBuild: false,
        classifier: 'onejar',
        legacyCollisionNames: false,
        outputDirectory: undefined,
        template: undefined,
      },
    });
  });

  it('keeps absolute paths as they are', () => {
    const descriptor = parseDescriptor(
      {
        project: { name: 'demo', version: '1.0.0', buildDirectory: '/builds/demo' },
        artifact: '/builds/demo/demo.jar',
        onejar: { outputDirectory: '/dist', template: '/boot/custom.jar' },
      },
      '/work/demo'
    );

    expect(descriptor.project.buildDirectory).toBe('/builds/demo');
    expect(descriptor.artifact).toBe('/builds/demo/demo.jar');
    expect(descriptor.onejar.outputDirectory).toBe('/dist');
    expect(descriptor.onejar.template).toBe('/boot/custom.jar');
  });

  it('lists every problem of an invalid descriptor', () => {
    expect(() => parseDescriptor({ project: { name: 'demo' } }, '/work')).toThrow(ConfigurationError);
    expect(() => parseDescriptor({ project: { name: 'demo' } }, '/work')).toThrow(
      'Invalid build descriptor: project.version: Required; artifact: Required'
    );
  });
});

describe('loadDescriptor', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'jarsmith-cli-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('resolves paths against the descriptor location', async () => {
    const path = join(directory, 'jarsmith.json');
    await writeFile(path, JSON.stringify({ project: { name: 'demo', version: '2.0.0' }, artifact: 'demo.jar' }));

    const descriptor = await loadDescriptor(path);

    expect(descriptor.artifact).toBe(join(directory, 'demo.jar'));
  });

  it('rejects a file that is not JSON', async () => {
    const path = join(directory, 'jarsmith.json');
    await writeFile(path, 'project: demo');

    await expect(loadDescriptor(path)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a missing file', async () => {
    const path = join(directory, 'missing.json');

    await expect(loadDescriptor(path)).rejects.toThrow(`Cannot read build descriptor ${path}`);
  });
});
