/**
 * Assembly Settings
 * 
 * Merges command-line flags over the build descriptor over environment defaults.
 */

import { join, resolve } from 'node:path';
import type { DeclaredDependency, ManifestOverrides, NativeLibrarySpec, ResolvedArtifact } from '@jarsmith/core';
import {
  ATTACHMENT_RECORD_NAME,
  OUTPUT_FILE_SUFFIX,
  templateFileName,
  type CollisionNaming,
  type TemplateLocation,
} from '@jarsmith/packaging';
import type { BuildDescriptor } from './descriptor.js';

// No bootstrap template ships in the bundled templates/ directory
export const TEMPLATE_HELP = [
  `No bootstrap template ships with jarsmith. Until ${templateFileName('<version>')} is`,
  'placed in the bundled templates/ directory, pass --template <file>, or point',
  '--template-dir or JARSMITH_TEMPLATE_DIR at a directory that holds one.',
].join('\n');

export interface AssembleFlags {
  output?: string;
  filename?: string;
  mainClass?: string;
  implVersion?: string;
  bootVersion?: string;
  template?: string;
  templateDir?: string;
  attach?: boolean;
  classifier?: string;
  legacyCollisionNames?: boolean;
}

export interface SettingsDefaults {
  templateDir: string;
  bootVersion: string;
}

export interface AssemblySettings {
  primaryArtifact: string;
  outputPath: string;
  template: TemplateLocation;
  manifest: ManifestOverrides;
  resolvedArtifacts: ResolvedArtifact[];
  declaredDependencies: DeclaredDependency[];
  nativeLibraries: NativeLibrarySpec[];
  collisionNaming: CollisionNaming;
  attach?: { classifier: string };
  attachmentRecordPath: string;
}

export function defaultFileName(project: BuildDescriptor['project']): string {
  const finalName = project.finalName ?? `${project.name}-${project.version}`;
  return `${finalName}${OUTPUT_FILE_SUFFIX}`;
}

export function resolveAssemblySettings(
  descriptor: BuildDescriptor,
  flags: AssembleFlags,
  defaults: SettingsDefaults
): AssemblySettings {
  const { project, onejar } = descriptor;

  const outputDirectory = flags.output !== undefined
    ? resolve(flags.output)
    : onejar.outputDirectory ?? project.buildDirectory;
  const fileName = flags.filename ?? onejar.filename ?? defaultFileName(project);

  const explicitTemplate = flags.template !== undefined ? resolve(flags.template) : onejar.template;
  const mainClass = flags.mainClass ?? descriptor.mainClass;
  const attach = flags.attach ?? onejar.attachToBuild;
  const legacy = flags.legacyCollisionNames ?? onejar.legacyCollisionNames;

  return {
    primaryArtifact: descriptor.artifact,
    outputPath: join(outputDirectory, fileName),
    template: {
      version: flags.bootVersion ?? onejar.bootVersion ?? defaults.bootVersion,
      directory: flags.templateDir !== undefined ? resolve(flags.templateDir) : defaults.templateDir,
      ...(explicitTemplate !== undefined && { explicitPath: explicitTemplate }),
    },
    manifest: {
      implementationVersion: flags.implVersion ?? descriptor.implementationVersion ?? project.version,
      ...(mainClass !== undefined && { mainClass }),
    },
    resolvedArtifacts: descriptor.resolvedArtifacts,
    declaredDependencies: descriptor.dependencies,
    nativeLibraries: descriptor.binlibs,
    collisionNaming: legacy ? 'legacy' : 'preserve-extension',
    ...(attach && { attach: { classifier: flags.classifier ?? onejar.classifier } }),
    attachmentRecordPath: join(outputDirectory, ATTACHMENT_RECORD_NAME),
  };
}
