/**
 * Templates Command
 * 
 * List the bootstrap template versions available.
 */

import chalk from 'chalk';
import { listTemplateVersions, templateFileName } from '@jarsmith/packaging';
import { config } from '../config/index.js';
import { exitWithError, printHeader, printInfo, printJson } from '../lib/output.js';

interface TemplatesOptions {
  templateDir?: string;
  json?: boolean;
}

export async function templatesCommand(options: TemplatesOptions): Promise<void> {
  const directory = options.templateDir ?? config.templateDir;

  try {
    const versions = await listTemplateVersions(directory);

    if (options.json) {
      printJson({ directory, defaultVersion: config.bootVersion, versions });
      return;
    }

    printHeader(`Bootstrap templates in ${directory}`);
    if (versions.length === 0) {
      printInfo(`No templates found; expected files named ${templateFileName('<version>')}`);
      return;
    }
    for (const version of versions) {
      const marker = version === config.bootVersion ? chalk.green(' (default)') : '';
      console.log(`  ${templateFileName(version)}${marker}`);
    }
  } catch (error) {
    exitWithError(error);
  }
}
