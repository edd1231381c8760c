/**
 * In-memory storage implementation.
 *
 * Reference implementation for tests and programmatic use. Records are
 * deep-copied on the way in and out so callers cannot mutate stored state.
 */

import { FlowRun } from '../domain/run';
import { ArtifactStore, RunResultStore, Store, StoredArtifact } from './store';

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunResultStore implements RunResultStore {
  private data = new Map<string, FlowRun>();

  async save(run: FlowRun): Promise<string> {
    this.data.set(run.runId, deepCopy(run));
    return `memory://runs/${run.runId}`;
  }

  async getById(runId: string): Promise<FlowRun | null> {
    const run = this.data.get(runId);
    return run ? deepCopy(run) : null;
  }
}

class MemoryArtifactStore implements ArtifactStore {
  private data = new Map<string, Buffer>();

  async write(name: string, data: Buffer): Promise<StoredArtifact> {
    this.data.set(name, Buffer.from(data));
    return { name, location: `memory://artifacts/${name}`, bytes: data.length };
  }

  async read(name: string): Promise<Buffer | null> {
    const data = this.data.get(name);
    return data ? Buffer.from(data) : null;
  }
}

/** Create a fresh in-memory store. */
export function createMemoryStore(): Store {
  return {
    results: new MemoryRunResultStore(),
    artifacts: new MemoryArtifactStore(),
  };
}
