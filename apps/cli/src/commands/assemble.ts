/**
 * Assemble Command
 * 
 * Build a one-jar archive from a build descriptor.
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  ArchiveAssembler,
  GlobFileSetMatcher,
  JsonArtifactAttacher,
  StaticDeclaredDependencySource,
  StaticDependencyResolver,
  resolveTemplateArchive,
  type AssemblyResult,
} from '@jarsmith/packaging';
import { config } from '../config/index.js';
import { loadDescriptor } from '../lib/descriptor.js';
import { resolveAssemblySettings, type AssembleFlags } from '../lib/settings.js';
import {
  exitWithError,
  formatBytes,
  printHeader,
  printJson,
  printKeyValue,
  printWarning,
} from '../lib/output.js';

interface AssembleOptions extends AssembleFlags {
  descriptor: string;
  json?: boolean;
}

export async function assembleCommand(options: AssembleOptions): Promise<void> {
  const spinner = options.json ? null : ora('Assembling one-jar...').start();

  try {
    const descriptor = await loadDescriptor(options.descriptor);
    const settings = resolveAssemblySettings(descriptor, options, {
      templateDir: config.templateDir,
      bootVersion: config.bootVersion,
    });
    const templateArchive = await resolveTemplateArchive(settings.template);

    const assembler = new ArchiveAssembler({
      dependencyResolver: new StaticDependencyResolver(settings.resolvedArtifacts),
      declaredDependencies: new StaticDeclaredDependencySource(settings.declaredDependencies),
      fileSetMatcher: new GlobFileSetMatcher(),
      artifactAttacher: new JsonArtifactAttacher(settings.attachmentRecordPath),
    });

    const result = await assembler.assemble({
      primaryArtifact: settings.primaryArtifact,
      outputPath: settings.outputPath,
      templateArchive,
      manifest: settings.manifest,
      nativeLibraries: settings.nativeLibraries,
      collisionNaming: settings.collisionNaming,
      attach: settings.attach,
    });

    if (options.json) {
      printJson(summarize(result));
      return;
    }

    spinner?.succeed(`Assembled ${result.outputPath}`);
    printResult(result);
  } catch (error) {
    spinner?.fail('Assembly failed');
    exitWithError(error);
  }
}

function summarize(result: AssemblyResult) {
  return {
    outputPath: result.outputPath,
    sizeBytes: result.sizeBytes,
    sha256: result.sha256,
    renamed: result.renamedCount,
    attachedClassifier: result.attachedClassifier,
    entries: result.entries.map((entry) => ({
      name: entry.name,
      origin: entry.origin,
      size: entry.size,
      ...(entry.renamed && { requestedName: entry.requestedName }),
    })),
  };
}

function printResult(result: AssemblyResult): void {
  printHeader('One-jar');
  printKeyValue('File', result.outputPath);
  printKeyValue('Size', formatBytes(result.sizeBytes));
  printKeyValue('SHA-256', result.sha256);
  printKeyValue('Entries', result.entries.length);
  if (result.attachedClassifier !== null) {
    printKeyValue('Attached as', result.attachedClassifier);
  }
  console.log();

  for (const entry of result.entries) {
    console.log(`  ${chalk.cyan(entry.origin.padEnd(8))} ${entry.name}`);
  }

  if (result.renamedCount > 0) {
    console.log();
    printWarning(`${result.renamedCount} duplicate entr${result.renamedCount === 1 ? 'y was' : 'ies were'} renamed:`);
    for (const entry of result.entries.filter((e) => e.renamed)) {
      console.log(`  ${chalk.gray(entry.requestedName)} → ${entry.name}`);
    }
  }
}
