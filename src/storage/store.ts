/**
 * Storage layer interfaces.
 *
 * The orchestrator persists two things: the run record (every StepResult,
 * written at the end of each run whether it succeeded or not) and the
 * downloaded QR image. Backends are pluggable; the CLI writes to disk,
 * tests keep everything in memory.
 */

import { FlowRun } from '../domain/run';

/** Persists the accumulated run record. */
export interface RunResultStore {
  /** Save the run; returns where it was written (a path or an in-memory key). */
  save(run: FlowRun): Promise<string>;
  getById(runId: string): Promise<FlowRun | null>;
}

/** A binary artifact produced by a run. */
export interface StoredArtifact {
  /** File name, e.g. `qr_17.pdf`. */
  name: string;
  /** Where the artifact was written. */
  location: string;
  bytes: number;
}

/** Writes binary artifacts (the QR image) produced during a run. */
export interface ArtifactStore {
  write(name: string, data: Buffer): Promise<StoredArtifact>;
  read(name: string): Promise<Buffer | null>;
}

/** Composite store interface. */
export interface Store {
  results: RunResultStore;
  artifacts: ArtifactStore;
}

/** Name of the file a run's QR image is stored under. */
export function qrImageFileName(qrCodeId: number, extension: string): string {
  return `qr_${qrCodeId}.${extension}`;
}
