/**
 * Collaborator Ports
 * 
 * Everything the assembler needs from the surrounding build, one method each.
 */

import type { DeclaredDependency, NativeLibrarySpec, ResolvedArtifact } from './sources.js';

export interface DependencyResolver {
  resolveArtifacts(): Promise<ResolvedArtifact[]>;
}

export interface DeclaredDependencySource {
  listDeclaredDependencies(): Promise<DeclaredDependency[]>;
}

/**
 * Expands a file-set into concrete absolute file paths.
 * Rejects with a ConfigurationError for a missing directory or a malformed pattern.
 */
export interface FileSetMatcher {
  match(spec: NativeLibrarySpec): Promise<string[]>;
}

export interface ArtifactAttacher {
  attach(file: string, classifier: string): Promise<void>;
}
