/**
 * Run domain model.
 *
 * A single execution of the linkpage PDF flow: the fixed step order,
 * the flow state machine's vocabulary, per-step results and the
 * run-scoped context the orchestrator owns.
 */

import { EnvironmentConfig } from './environment';
import { TypedError } from './errors';

/** Step identifiers, in execution order. Values are part of the persisted record. */
export enum StepKey {
  CreateLinkpage = '1-create-linkpage',
  CreateQrCode = '2-create-qr',
  GetQrDetails = '2.1-get-qr-details',
  DownloadQrImage = '2.2-download-qr-image',
  GetSignedUrl = '3-get-signed-url',
  UploadToStorage = '4-upload-to-storage',
  VerifyMedia = '4.1-verify-media',
  ActivateMedia = '4.2-activate-media',
  AddPdfWidget = '5-add-pdf-to-linkpage',
  DeletePdfWidget = '6-delete-pdf-from-linkpage',
}

/** Non-step flow states. */
export enum FlowPhase {
  NotStarted = 'not_started',
  Completed = 'completed',
  Failed = 'failed',
}

export type FlowState = StepKey | FlowPhase;

/** The mandatory steps; DeletePdfWidget is appended only when cleanup is requested. */
export const STEP_ORDER: readonly StepKey[] = [
  StepKey.CreateLinkpage,
  StepKey.CreateQrCode,
  StepKey.GetQrDetails,
  StepKey.DownloadQrImage,
  StepKey.GetSignedUrl,
  StepKey.UploadToStorage,
  StepKey.VerifyMedia,
  StepKey.ActivateMedia,
  StepKey.AddPdfWidget,
];

/** Valid state transitions. Every step may fail; only AddPdfWidget branches. */
export const VALID_FLOW_TRANSITIONS: Record<FlowState, FlowState[]> = {
  [FlowPhase.NotStarted]: [StepKey.CreateLinkpage, FlowPhase.Failed],
  [StepKey.CreateLinkpage]: [StepKey.CreateQrCode, FlowPhase.Failed],
  [StepKey.CreateQrCode]: [StepKey.GetQrDetails, FlowPhase.Failed],
  [StepKey.GetQrDetails]: [StepKey.DownloadQrImage, FlowPhase.Failed],
  [StepKey.DownloadQrImage]: [StepKey.GetSignedUrl, FlowPhase.Failed],
  [StepKey.GetSignedUrl]: [StepKey.UploadToStorage, FlowPhase.Failed],
  [StepKey.UploadToStorage]: [StepKey.VerifyMedia, FlowPhase.Failed],
  [StepKey.VerifyMedia]: [StepKey.ActivateMedia, FlowPhase.Failed],
  [StepKey.ActivateMedia]: [StepKey.AddPdfWidget, FlowPhase.Failed],
  [StepKey.AddPdfWidget]: [StepKey.DeletePdfWidget, FlowPhase.Completed, FlowPhase.Failed],
  [StepKey.DeletePdfWidget]: [FlowPhase.Completed, FlowPhase.Failed],
  [FlowPhase.Completed]: [],
  [FlowPhase.Failed]: [],
};

/** Result of one completed step. Frozen once recorded. */
export interface StepResult {
  stepKey: StepKey;
  /** HTTP status of the step's primary request. */
  status: number;
  /** Decoded response body. */
  body: Record<string, unknown>;
  /** Fields this step feeds forward. */
  outputs: Record<string, unknown>;
  timestamp: string;
  /** Number of attempts made (including retries). */
  attempts: number;
  durationMs: number;
}

/** Flow-level identifiers accumulated over the run. */
export interface FlowSummary {
  linkpage_id?: number;
  linkpage_url?: string;
  qr_code_id?: number;
  qr_url?: string | null;
  qr_image_path?: string;
  media_id?: number;
  pdf_url?: string;
  link_id?: number;
}

export interface Credentials {
  apiKey: string;
  organizationId: number;
}

/**
 * Mutable run state, owned exclusively by one orchestrator execution.
 * Never shared between runs.
 */
export interface RunContext {
  runId: string;
  credentials: Credentials;
  environment: EnvironmentConfig;
  cleanupRequested: boolean;
  state: FlowState;
  /** Every state entered, starting with not_started. */
  transitions: FlowState[];
  /** Completed step results, insertion-ordered by execution. */
  stepResults: Map<StepKey, StepResult>;
  flow: FlowSummary;
  startedAt: string;
  completedAt?: string;
  error?: TypedError;
}

/** The persisted record of a run. Contains no credentials. */
export interface FlowRun {
  runId: string;
  state: FlowState;
  environment: string;
  apiBaseUrl: string;
  pdfBaseUrl: string;
  organizationId: number;
  cleanupRequested: boolean;
  startedAt: string;
  completedAt?: string;
  transitions: FlowState[];
  stepResults: Record<string, StepResult>;
  flow: FlowSummary;
  error?: TypedError;
}

/** Snapshot a run context into its persisted form. */
export function toFlowRun(ctx: RunContext): FlowRun {
  const stepResults: Record<string, StepResult> = {};
  for (const [key, result] of ctx.stepResults) {
    stepResults[key] = result;
  }
  return {
    runId: ctx.runId,
    state: ctx.state,
    environment: ctx.environment.name,
    apiBaseUrl: ctx.environment.apiBaseUrl,
    pdfBaseUrl: ctx.environment.pdfBaseUrl,
    organizationId: ctx.credentials.organizationId,
    cleanupRequested: ctx.cleanupRequested,
    startedAt: ctx.startedAt,
    completedAt: ctx.completedAt,
    transitions: [...ctx.transitions],
    stepResults,
    flow: { ...ctx.flow },
    error: ctx.error,
  };
}
