/**
 * Build Descriptor
 * 
 * JSON description of one build: the project, its primary artifact, resolved
 * and declared dependencies, native library file-sets and one-jar settings.
 * Relative paths are resolved against the descriptor's own directory.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, describeError } from '@jarsmith/core';
import { DEFAULT_CLASSIFIER } from '@jarsmith/packaging';

const fileSetSchema = z.object({
  directory: z.string().min(1),
  includes: z.array(z.string()).default([]),
  excludes: z.array(z.string()).default([]),
});

const descriptorSchema = z.object({
  project: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    finalName: z.string().min(1).optional(),
    buildDirectory: z.string().min(1).default('target'),
  }),
  artifact: z.string().min(1),
  mainClass: z.string().min(1).optional(),
  implementationVersion: z.string().min(1).optional(),
  resolvedArtifacts: z.array(z.object({
    id: z.string().optional(),
    file: z.string().min(1).optional(),
  })).default([]),
  dependencies: z.array(z.object({
    id: z.string().optional(),
    scope: z.string().min(1).default('compile'),
    systemPath: z.string().min(1).optional(),
  })).default([]),
  binlibs: z.array(fileSetSchema).default([]),
  onejar: z.object({
    filename: z.string().min(1).optional(),
    outputDirectory: z.string().min(1).optional(),
    bootVersion: z.string().min(1).optional(),
    template: z.string().min(1).optional(),
    attachToBuild: z.boolean().default(false),
    classifier: z.string().min(1).default(DEFAULT_CLASSIFIER),
    legacyCollisionNames: z.boolean().default(false),
  }).default({}),
});

export type BuildDescriptor = z.infer<typeof descriptorSchema>;

function resolveOptional(baseDir: string, path: string | undefined): string | undefined {
  return path === undefined ? undefined : resolve(baseDir, path);
}

/**
 * Validate raw descriptor data and make its paths absolute
 */
export function parseDescriptor(data: unknown, baseDir: string): BuildDescriptor {
  const parsed = descriptorSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid build descriptor: ${issues.join('; ')}`, { issues });
  }

  const descriptor = parsed.data;
  return {
    ...descriptor,
    project: {
      ...descriptor.project,
      buildDirectory: resolve(baseDir, descriptor.project.buildDirectory),
    },
    artifact: resolve(baseDir, descriptor.artifact),
    resolvedArtifacts: descriptor.resolvedArtifacts.map((artifact) => ({
      ...artifact,
      file: resolveOptional(baseDir, artifact.file),
    })),
    dependencies: descriptor.dependencies.map((dependency) => ({
      ...dependency,
      systemPath: resolveOptional(baseDir, dependency.systemPath),
    })),
    binlibs: descriptor.binlibs.map((fileSet) => ({
      ...fileSet,
      directory: resolve(baseDir, fileSet.directory),
    })),
    onejar: {
      ...descriptor.onejar,
      outputDirectory: resolveOptional(baseDir, descriptor.onejar.outputDirectory),
      template: resolveOptional(baseDir, descriptor.onejar.template),
    },
  };
}

export async function loadDescriptor(descriptorPath: string): Promise<BuildDescriptor> {
  const absolutePath = resolve(descriptorPath);

  let data: unknown;
  try {
    data = JSON.parse(await readFile(absolutePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read build descriptor ${absolutePath}: ${describeError(error)}`,
      { descriptorPath: absolutePath },
      error
    );
  }

  return parseDescriptor(data, dirname(absolutePath));
}
