/**
 * Manifest Synthesizer
 * 
 * Takes the manifest out of the bootstrap template and writes the
 * caller's attributes over its main section.
 */

import { ConfigurationError, type ManifestOverrides } from '@jarsmith/core';
import { readArchiveEntries } from './archiveReader.js';
import {
  IMPLEMENTATION_VERSION_ATTRIBUTE,
  MAIN_CLASS_ATTRIBUTE,
  MANIFEST_NAME,
} from './constants.js';
import { parseManifest, type Manifest } from './manifest.js';

/**
 * Overrides replace template values under the same name; template-only
 * attributes are left alone
 */
export function applyManifestOverrides(manifest: Manifest, overrides: ManifestOverrides): Manifest {
  if (overrides.mainClass !== undefined) {
    manifest.mainAttributes.set(MAIN_CLASS_ATTRIBUTE, overrides.mainClass);
  }
  manifest.mainAttributes.set(IMPLEMENTATION_VERSION_ATTRIBUTE, overrides.implementationVersion);
  return manifest;
}

export async function readTemplateManifest(templateArchive: string): Promise<Manifest> {
  for await (const entry of readArchiveEntries(templateArchive)) {
    if (entry.name === MANIFEST_NAME) {
      return parseManifest(entry.content);
    }
  }
  throw new ConfigurationError(
    `Template archive ${templateArchive} does not contain ${MANIFEST_NAME}`,
    { templateArchive }
  );
}

export async function buildManifest(
  templateArchive: string,
  overrides: ManifestOverrides
): Promise<Manifest> {
  const manifest = await readTemplateManifest(templateArchive);
  return applyManifestOverrides(manifest, overrides);
}
