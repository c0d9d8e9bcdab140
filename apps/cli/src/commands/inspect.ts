/**
 * Inspect Command
 * 
 * List the entries and manifest of an archive.
 */

import chalk from 'chalk';
import { inspectArchive } from '@jarsmith/packaging';
import {
  exitWithError,
  formatBytes,
  printHeader,
  printJson,
  printKeyValue,
  printWarning,
} from '../lib/output.js';

interface InspectOptions {
  json?: boolean;
}

export async function inspectCommand(archive: string, options: InspectOptions): Promise<void> {
  try {
    const inspection = await inspectArchive(archive);

    if (options.json) {
      printJson({
        path: inspection.path,
        entries: inspection.entries,
        manifest: inspection.manifest && {
          main: inspection.manifest.mainAttributes.toObject(),
          sections: Object.fromEntries(
            [...inspection.manifest.sections].map(([name, attributes]) => [name, attributes.toObject()])
          ),
        },
      });
      return;
    }

    printHeader(`Archive ${inspection.path}`);
    if (inspection.manifest) {
      console.log(chalk.bold('Manifest:'));
      for (const [name, value] of inspection.manifest.mainAttributes) {
        printKeyValue(name, value);
      }
      console.log();
    } else {
      printWarning('No manifest found');
    }

    console.log(chalk.bold(`Entries (${inspection.entries.length}):`));
    for (const entry of inspection.entries) {
      console.log(`  ${formatBytes(entry.size).padStart(10)}  ${entry.name}`);
    }
  } catch (error) {
    exitWithError(error);
  }
}
