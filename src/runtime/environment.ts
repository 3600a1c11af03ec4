import * as AST from '../parser/ast';
import { ArtifactCache } from './cache';
import { ReadWriteLock } from './rwlock';

/** Mutable interpreter state. Only reachable through Environment.read/write. */
export interface EnvironmentState {
  variables: Map<string, AST.Literal>;
  rifts: Map<string, AST.Statement[]>;
  tasks: Map<string, AST.Statement[]>;
  artifactCache: ArtifactCache;
  targetLanguage?: string;
}

export interface EnvironmentView {
  readonly variables: ReadonlyMap<string, AST.Literal>;
  readonly rifts: ReadonlyMap<string, readonly AST.Statement[]>;
  readonly tasks: ReadonlyMap<string, readonly AST.Statement[]>;
  readonly artifactCache: Pick<ArtifactCache, 'get' | 'has' | 'size' | 'keys'>;
  readonly targetLanguage?: string;
}

export interface EnvironmentSummary {
  rifts: string[];
  tasks: string[];
  variables: string[];
  cacheEntries: number;
  targetLanguage?: string;
}

/**
 * Shared state for one session: variables, named rifts and tasks, the
 * artifact cache and the optimize target. Concurrent statements share one
 * instance; callbacks passed to read/write are synchronous so the lock is
 * never held across an await.
 */
export class Environment {
  private lock = new ReadWriteLock();
  private state: EnvironmentState = {
    variables: new Map(),
    rifts: new Map(),
    tasks: new Map(),
    artifactCache: new ArtifactCache(),
  };

  read<T>(fn: (view: EnvironmentView) => T): Promise<T> {
    return this.lock.read(() => fn(this.state));
  }

  write<T>(fn: (state: EnvironmentState) => T): Promise<T> {
    return this.lock.write(() => fn(this.state));
  }

  clear(): Promise<void> {
    return this.write(state => {
      state.variables.clear();
      state.rifts.clear();
      state.tasks.clear();
      state.artifactCache.clear();
      state.targetLanguage = undefined;
    });
  }

  summary(): Promise<EnvironmentSummary> {
    return this.read(view => ({
      rifts: [...view.rifts.keys()],
      tasks: [...view.tasks.keys()],
      variables: [...view.variables.keys()],
      cacheEntries: view.artifactCache.size,
      targetLanguage: view.targetLanguage,
    }));
  }
}
