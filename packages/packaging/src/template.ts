/**
 * Bootstrap Template Lookup
 */

import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '@jarsmith/core';
import { isDirectory, isRegularFile } from '@jarsmith/utils';
import { TEMPLATE_PREFIX, TEMPLATE_SUFFIX } from './constants.js';

export interface TemplateLocation {
  version: string;
  directory: string;
  // Takes precedence over version + directory
  explicitPath?: string;
}

export function templateFileName(version: string): string {
  return `${TEMPLATE_PREFIX}${version}${TEMPLATE_SUFFIX}`;
}

export async function resolveTemplateArchive(location: TemplateLocation): Promise<string> {
  const templatePath = resolve(
    location.explicitPath ?? join(location.directory, templateFileName(location.version))
  );
  if (!(await isRegularFile(templatePath))) {
    throw new ConfigurationError(`Bootstrap template not found: ${templatePath}`, {
      templatePath,
      version: location.version,
    });
  }
  return templatePath;
}

/**
 * Versions of the templates available in a directory, sorted
 */
export async function listTemplateVersions(directory: string): Promise<string[]> {
  if (!(await isDirectory(directory))) {
    throw new ConfigurationError(`Template directory not found: ${directory}`, { directory });
  }
  const names = await readdir(directory);
  return names
    .filter((name) =>
      name.startsWith(TEMPLATE_PREFIX) &&
      name.endsWith(TEMPLATE_SUFFIX) &&
      name.length > TEMPLATE_PREFIX.length + TEMPLATE_SUFFIX.length
    )
    .map((name) => name.slice(TEMPLATE_PREFIX.length, name.length - TEMPLATE_SUFFIX.length))
    .sort();
}
