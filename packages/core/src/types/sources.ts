/**
 * Source Types
 * 
 * Inputs to an assembly run and the files enumerated from them.
 */

/**
 * Destination namespace inside the output archive
 */
export type Namespace = 'main' | 'lib' | 'binlib';

/**
 * A file on disk to embed, with where it lands in the output
 */
export interface SourceFile {
  readonly path: string;
  readonly namespace: Namespace;
  readonly fileName: string;
}

/**
 * One artifact handed over by dependency resolution.
 * `file` is absent for artifacts that were never materialized (pom-only, unresolved).
 */
export interface ResolvedArtifact {
  file?: string;
  id?: string;
}

/**
 * A dependency as declared by the project
 */
export interface DeclaredDependency {
  scope: string;
  systemPath?: string;
  id?: string;
}

/**
 * A directory plus glob patterns naming native library files
 */
export interface NativeLibrarySpec {
  directory: string;
  includes: string[];
  excludes: string[];
}

/**
 * Attributes written over the template manifest
 */
export interface ManifestOverrides {
  mainClass?: string;
  implementationVersion: string;
}
