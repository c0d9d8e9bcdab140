/**
 * @jarsmith/packaging
 * 
 * One-jar assembly engine.
 * 
 * Responsibilities:
 * - Write entries into the output archive with collision renaming
 * - Build the output manifest from the bootstrap template
 * - Enumerate primary, dependency and native library sources
 * - Merge the bootstrap template
 * - Run the whole assembly with cleanup on failure
 */

export {
  ArchiveAssembler,
  type AssemblyPorts,
  type AssemblyRequest,
  type AssemblyResult,
  type AssembledEntry,
  type EntryOrigin,
} from './assembler.js';

export {
  EntryWriter,
  type EntryContent,
  type EntryWriterOptions,
  type CollisionNaming,
  type WrittenEntry,
} from './entryWriter.js';

export {
  Manifest,
  Attributes,
  parseManifest,
  serializeManifest,
} from './manifest.js';

export {
  buildManifest,
  readTemplateManifest,
  applyManifestOverrides,
} from './manifestSynthesizer.js';

export {
  SourceEnumerator,
  toSourceFile,
  entryNameFor,
  type EnumerationInput,
} from './sourceEnumerator.js';

export { mergeTemplate } from './templateMerger.js';

export { readArchiveEntries, type ArchiveEntry } from './archiveReader.js';

export {
  inspectArchive,
  type ArchiveInspection,
  type InspectedEntry,
} from './inspect.js';

export {
  resolveTemplateArchive,
  listTemplateVersions,
  templateFileName,
  type TemplateLocation,
} from './template.js';

export { GlobFileSetMatcher, findPatternProblem } from './adapters/globFileSetMatcher.js';
export { JsonArtifactAttacher, type AttachedArtifact } from './adapters/jsonArtifactAttacher.js';
export { StaticDependencyResolver, StaticDeclaredDependencySource } from './adapters/staticPorts.js';

export * from './constants.js';
