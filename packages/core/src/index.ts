/**
 * @jarsmith/core
 * 
 * Core package containing:
 * - Assembly state machine
 * - Error handling
 * - Shared types and collaborator ports
 */

// State machine
export {
  ASSEMBLY_STATES,
  AssemblyStateMachine,
  isValidTransition,
  getNextStates,
} from './stateMachine.js';

export type {
  AssemblyState,
  AssemblyStateTransition,
} from './stateMachine.js';

// Types
export type {
  Namespace,
  SourceFile,
  ResolvedArtifact,
  DeclaredDependency,
  NativeLibrarySpec,
  ManifestOverrides,
} from './types/sources.js';

export type {
  DependencyResolver,
  DeclaredDependencySource,
  FileSetMatcher,
  ArtifactAttacher,
} from './types/ports.js';

// Errors
export {
  JarsmithError,
  ConfigurationError,
  IoFailureError,
  AttachmentError,
  StateTransitionError,
  describeError,
  toJarsmithError,
} from './errors/index.js';
