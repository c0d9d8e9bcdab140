/**
 * Fixed-list implementations of the dependency ports, for callers that
 * already hold the resolved and declared dependency lists.
 */

import type {
  DeclaredDependency,
  DeclaredDependencySource,
  DependencyResolver,
  ResolvedArtifact,
} from '@jarsmith/core';

export class StaticDependencyResolver implements DependencyResolver {
  constructor(private readonly artifacts: ResolvedArtifact[]) {}

  async resolveArtifacts(): Promise<ResolvedArtifact[]> {
    return [...this.artifacts];
  }
}

export class StaticDeclaredDependencySource implements DeclaredDependencySource {
  constructor(private readonly dependencies: DeclaredDependency[]) {}

  async listDeclaredDependencies(): Promise<DeclaredDependency[]> {
    return [...this.dependencies];
  }
}
