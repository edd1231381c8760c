/**
 * File-system storage: the run record goes to `flow_results.json` and
 * artifacts are written next to it, all inside one output directory.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { FlowRun } from '../domain/run';
import { ArtifactStore, RunResultStore, Store, StoredArtifact } from './store';

export const RESULTS_FILE_NAME = 'flow_results.json';

// fs errors may come from another realm, so match on shape rather than instanceof Error.
function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/** Resolve a file name inside the output directory, rejecting anything that escapes it. */
function resolveInside(outputDir: string, name: string): string {
  const root = path.resolve(outputDir);
  const target = path.resolve(root, name);
  if (path.dirname(target) !== root) {
    throw new Error(`Artifact name must be a plain file name: "${name}"`);
  }
  return target;
}

class FileRunResultStore implements RunResultStore {
  constructor(private readonly outputDir: string) {}

  async save(run: FlowRun): Promise<string> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const target = resolveInside(this.outputDir, RESULTS_FILE_NAME);
    await fs.writeFile(target, JSON.stringify(run, null, 2), 'utf-8');
    return target;
  }

  /** The directory holds the most recent run only. */
  async getById(runId: string): Promise<FlowRun | null> {
    let text: string;
    try {
      text = await fs.readFile(resolveInside(this.outputDir, RESULTS_FILE_NAME), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    const run: FlowRun = JSON.parse(text);
    return run.runId === runId ? run : null;
  }
}

class FileArtifactStore implements ArtifactStore {
  constructor(private readonly outputDir: string) {}

  async write(name: string, data: Buffer): Promise<StoredArtifact> {
    await fs.mkdir(this.outputDir, { recursive: true });
    const target = resolveInside(this.outputDir, name);
    await fs.writeFile(target, data);
    return { name, location: target, bytes: data.length };
  }

  async read(name: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(resolveInside(this.outputDir, name));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }
}

/** Create a store rooted at the given output directory. */
export function createFileStore(outputDir: string): Store {
  return {
    results: new FileRunResultStore(outputDir),
    artifacts: new FileArtifactStore(outputDir),
  };
}
