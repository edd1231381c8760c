/**
 * Flow Orchestrator: the core sequencing engine.
 *
 * Drives the endpoint adapters strictly in order, threading each step's
 * output into the next, recording a StepResult per completed step and
 * persisting the run record at the end of every run. The first failure
 * moves the run to `failed`; remote resources created before it are left
 * in place.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import {
  AdapterContext,
  DEFAULT_QR_DOWNLOAD,
  QrDownloadOptions,
  activateMedia,
  addPdfWidget,
  createLinkpage,
  createQrCode,
  deletePdfWidget,
  downloadQrImage,
  getQrDetails,
  requestSignedUpload,
  uploadToStorage,
  verifyMedia,
} from '../adapters';
import { PdfFile, QrImage } from '../domain/entities';
import { EnvironmentConfig, buildPdfUrl } from '../domain/environment';
import {
  FlowError,
  TypedError,
  createTypedError,
  maskSecret,
  maskTypedError,
  preconditionError,
} from '../domain/errors';
import {
  Credentials,
  FlowPhase,
  FlowRun,
  FlowState,
  RunContext,
  StepKey,
  toFlowRun,
} from '../domain/run';
import { Logger, logger as rootLogger } from '../logger';
import { Store, qrImageFileName } from '../storage/store';
import { FetchLike, HttpTransport, DEFAULT_TIMEOUT_MS } from '../transport/http-transport';
import { isTerminalFlowState, nextFlowState, transitionFlowState } from './state-machine';
import { DEFAULT_STEP_POLICY, StepDefinition, StepPolicy, executeStep } from './step-runner';

export const PDF_CONTENT_TYPE = 'application/pdf';

function errorCode(err: unknown): string | undefined {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
    ? err.code
    : undefined;
}

/** What one run publishes. */
export interface FlowInput {
  pdfPath: string;
  linkpageName: string;
  qrName: string;
  /** Optional media folder for the upload. */
  mediaFolder?: number;
  /** Run the compensating widget deletion after the widget is attached. */
  deleteAfter: boolean;
  qrDownload?: QrDownloadOptions;
}

export interface OrchestratorConfig {
  credentials: Credentials;
  environment: EnvironmentConfig;
  timeoutMs?: number;
  policy?: Partial<StepPolicy>;
  fetchFn?: FetchLike;
  logger?: Logger;
}

export class FlowOrchestrator {
  private readonly policy: StepPolicy;
  private readonly adapters: AdapterContext;
  private readonly log: Logger;

  constructor(
    private readonly store: Store,
    private readonly config: OrchestratorConfig,
  ) {
    this.policy = { ...DEFAULT_STEP_POLICY, ...config.policy };
    this.log = config.logger ?? rootLogger.child({ module: 'orchestrator' });
    this.adapters = {
      credentials: config.credentials,
      environment: config.environment,
      transport: new HttpTransport({
        credentials: config.credentials,
        apiBaseUrl: config.environment.apiBaseUrl,
        timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        fetchFn: config.fetchFn,
        logger: this.log.child({ module: 'transport' }),
      }),
    };
  }

  /**
   * Execute one run. Never throws for step failures: the returned record
   * carries the final state, every completed StepResult and the error.
   */
  async run(input: FlowInput): Promise<FlowRun> {
    const ctx = this.createContext(input.deleteAfter);
    const log = this.log.child({ runId: ctx.runId });

    log.info('Flow started', {
      environment: ctx.environment.name,
      apiBaseUrl: ctx.environment.apiBaseUrl,
      pdfBaseUrl: ctx.environment.pdfBaseUrl,
      organization: ctx.credentials.organizationId,
      token: maskSecret(ctx.credentials.apiKey),
      cleanup: ctx.cleanupRequested,
    });

    try {
      const file = await this.checkPdf(input.pdfPath);
      await this.execute(ctx, input, file, log);
      this.transition(ctx, FlowPhase.Completed);
      ctx.completedAt = new Date().toISOString();
      log.info('Flow complete', { ...ctx.flow });
    } catch (err) {
      this.fail(ctx, err, log);
    }

    await this.persist(ctx, log);
    return toFlowRun(ctx);
  }

  private createContext(cleanupRequested: boolean): RunContext {
    return {
      runId: `run_${uuid()}`,
      credentials: this.config.credentials,
      environment: this.config.environment,
      cleanupRequested,
      state: FlowPhase.NotStarted,
      transitions: [FlowPhase.NotStarted],
      stepResults: new Map(),
      flow: {},
      startedAt: new Date().toISOString(),
    };
  }

  /** Local preconditions, checked before any request is sent. */
  private async checkPdf(pdfPath: string): Promise<PdfFile> {
    let isFile: boolean;
    try {
      isFile = (await fs.stat(pdfPath)).isFile();
    } catch (err) {
      const code = errorCode(err);
      const message =
        code === 'ENOENT'
          ? `PDF file not found: ${pdfPath}`
          : `PDF file could not be checked (${code ?? 'unknown error'}): ${pdfPath}`;
      throw new FlowError(preconditionError(message, { pdfPath, code }));
    }
    if (!isFile) {
      throw new FlowError(preconditionError(`PDF path is not a file: ${pdfPath}`, { pdfPath }));
    }
    return { path: pdfPath, name: path.basename(pdfPath), contentType: PDF_CONTENT_TYPE };
  }

  private async readPdf(file: PdfFile): Promise<Buffer> {
    try {
      return await fs.readFile(file.path);
    } catch (err) {
      throw new FlowError(
        preconditionError(
          `PDF file could not be read before upload: ${err instanceof Error ? err.message : String(err)}`,
          { pdfPath: file.path },
          StepKey.UploadToStorage,
        ),
      );
    }
  }

  private async execute(ctx: RunContext, input: FlowInput, file: PdfFile, log: Logger): Promise<void> {
    const api = this.adapters;

    const linkpage = await this.step(ctx, log, {
      key: StepKey.CreateLinkpage,
      execute: () => createLinkpage(api, { name: input.linkpageName }),
      describe: (out) => ({ ...out }),
    });
    ctx.flow.linkpage_id = linkpage.linkpage_id;
    ctx.flow.linkpage_url = linkpage.linkpage_url;

    const qrCode = await this.step(ctx, log, {
      key: StepKey.CreateQrCode,
      execute: () => createQrCode(api, { linkpage, name: input.qrName }),
      describe: (out) => ({ ...out }),
    });
    ctx.flow.qr_code_id = qrCode.qr_code_id;

    const qrDetails = await this.step(ctx, log, {
      key: StepKey.GetQrDetails,
      execute: () => getQrDetails(api, qrCode),
      describe: (out) => ({ qr_url: out.qr_url, name: out.name }),
    });
    ctx.flow.qr_url = qrDetails.qr_url;

    const qrImage = await this.step<QrImage>(ctx, log, {
      key: StepKey.DownloadQrImage,
      execute: async () => {
        const downloaded = await downloadQrImage(api, qrCode, input.qrDownload ?? DEFAULT_QR_DOWNLOAD);
        const stored = await this.store.artifacts.write(
          qrImageFileName(qrCode.qr_code_id, downloaded.output.extension),
          downloaded.output.bytes,
        );
        return {
          status: downloaded.status,
          body: { ...downloaded.body, path: stored.location },
          output: {
            qr_code_id: qrCode.qr_code_id,
            path: stored.location,
            bytes: stored.bytes,
            content_type: downloaded.output.content_type,
          },
        };
      },
      describe: (out) => ({ qr_image_path: out.path, bytes: out.bytes }),
    });
    ctx.flow.qr_image_path = qrImage.path;

    const mediaUpload = await this.step(ctx, log, {
      key: StepKey.GetSignedUrl,
      execute: () => requestSignedUpload(api, { folder: input.mediaFolder }),
      describe: (out) => ({ media_id: out.media_id, upload_url: out.upload_url, fields: Object.keys(out.fields) }),
    });
    ctx.flow.media_id = mediaUpload.media_id;
    const pdfUrl = buildPdfUrl(ctx.environment, mediaUpload.media_id);
    ctx.flow.pdf_url = pdfUrl;
    log.info('Resolved PDF URL', { pdf_url: pdfUrl });

    const receipt = await this.step(ctx, log, {
      key: StepKey.UploadToStorage,
      execute: async () => uploadToStorage(api, mediaUpload, file, await this.readPdf(file)),
      describe: (out) => ({ media_id: out.media_id, file: file.name }),
    });

    const pendingMedia = await this.step(ctx, log, {
      key: StepKey.VerifyMedia,
      execute: () => verifyMedia(api, receipt),
      describe: (out) => ({ media_id: out.media_id, status: out.status }),
    });

    await this.step(ctx, log, {
      key: StepKey.ActivateMedia,
      execute: () => activateMedia(api, pendingMedia, file),
      describe: (out) => ({ media_id: out.media_id, status: out.status, name: out.name }),
    });

    const widget = await this.step(ctx, log, {
      key: StepKey.AddPdfWidget,
      execute: () => addPdfWidget(api, { linkpage, pdfUrl, pdfName: file.name }),
      describe: (out) => ({ link_id: out.link_id, pdf_url: out.pdf_url, links: out.links.length }),
    });
    ctx.flow.link_id = widget.link_id;

    if (ctx.cleanupRequested) {
      await this.step(ctx, log, {
        key: StepKey.DeletePdfWidget,
        execute: () => deletePdfWidget(api, { linkpage, widget }),
        describe: (out) => ({ deleted_link_id: out.deleted_link_id, remaining_links: out.links.length }),
      });
    }
  }

  /** Enter the step's state, run it, record its result. Throws FlowError on failure. */
  private async step<T>(ctx: RunContext, log: Logger, definition: StepDefinition<T>): Promise<T> {
    const expected = nextFlowState(ctx.state, ctx.cleanupRequested);
    if (expected !== definition.key) {
      throw new FlowError(
        createTypedError({
          code: 'RUN.OUT_OF_ORDER',
          kind: 'precondition',
          message: `Step ${definition.key} cannot run after ${ctx.state}`,
          stepId: definition.key,
          details: { current: ctx.state, expected },
        }),
      );
    }
    this.transition(ctx, definition.key);
    log.info('Step started', { step: definition.key });

    const outcome = await executeStep(definition, this.policy, log);
    if (!outcome.ok) {
      throw new FlowError(outcome.error);
    }

    if (ctx.stepResults.has(definition.key)) {
      throw new FlowError(
        createTypedError({
          code: 'RUN.DUPLICATE_STEP',
          kind: 'precondition',
          message: `Step ${definition.key} already has a result in this run`,
          stepId: definition.key,
        }),
      );
    }
    ctx.stepResults.set(definition.key, outcome.result);
    log.info('Step succeeded', {
      step: definition.key,
      status: outcome.result.status,
      attempts: outcome.result.attempts,
      ...outcome.result.outputs,
    });
    return outcome.output;
  }

  private transition(ctx: RunContext, target: FlowState): void {
    const result = transitionFlowState(ctx.state, target);
    if (!result.success || !result.newStatus) {
      throw new FlowError(
        result.error ??
          createTypedError({
            code: 'RUN.INVALID_TRANSITION',
            kind: 'precondition',
            message: `Invalid flow state transition: ${ctx.state} -> ${target}`,
          }),
      );
    }
    ctx.state = result.newStatus;
    ctx.transitions.push(result.newStatus);
  }

  private fail(ctx: RunContext, err: unknown, log: Logger): void {
    const raw: TypedError =
      err instanceof FlowError
        ? err.typedError
        : createTypedError({
            code: 'RUN.UNEXPECTED',
            kind: 'precondition',
            message: err instanceof Error ? err.message : String(err),
          });
    const error = maskTypedError({ ...raw, runId: ctx.runId }, [ctx.credentials.apiKey]);

    ctx.error = error;
    if (!isTerminalFlowState(ctx.state)) {
      ctx.state = FlowPhase.Failed;
      ctx.transitions.push(FlowPhase.Failed);
    }
    ctx.completedAt = new Date().toISOString();

    log.error('Flow failed', {
      step: error.stepId,
      kind: error.kind,
      code: error.code,
      error: error.message,
      completedSteps: [...ctx.stepResults.keys()],
    });
    if (ctx.stepResults.size > 0) {
      log.warn('Remote resources created before the failure are left in place', { ...ctx.flow });
    }
  }

  /** Persist the run record. A storage failure is logged; it never replaces the run outcome. */
  private async persist(ctx: RunContext, log: Logger): Promise<void> {
    try {
      const location = await this.store.results.save(toFlowRun(ctx));
      log.info('Run results saved', { location });
    } catch (err) {
      log.error('Failed to save run results', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
