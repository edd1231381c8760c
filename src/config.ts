import * as dotenv from 'dotenv';
import { DEFAULT_QR_DOWNLOAD, QrDownloadOptions } from './adapters/qrcode';
import { CliOptions } from './cli/parse-args';
import { QrCanvasType } from './domain/entities';
import {
  ENVIRONMENTS,
  ENVIRONMENT_NAMES,
  EnvironmentConfig,
  isEnvironmentName,
} from './domain/environment';
import { Credentials } from './domain/run';
import { DEFAULT_STEP_POLICY } from './engine/step-runner';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS } from './transport/http-transport';

export const DEFAULT_LINKPAGE_NAME = 'PDF Linkpage';
export const DEFAULT_QR_NAME = 'QR: PDF Linkpage';
export const DEFAULT_OUTPUT_DIR = '.';

const QR_FORMATS: readonly QrCanvasType[] = ['pdf', 'png', 'svg'];

/** Fully validated settings for one CLI run. */
export interface FlowConfig {
  credentials: Credentials;
  environment: EnvironmentConfig;
  pdfPath: string;
  linkpageName: string;
  qrName: string;
  mediaFolder?: number;
  deleteAfter: boolean;
  /** Directory for the QR image and flow_results.json. */
  outputDir: string;
  timeoutMs: number;
  maxAttempts: number;
  qrDownload: QrDownloadOptions;
  verbose: boolean;
  jsonLogs: boolean;
}

/** Invalid configuration; `problems` lists every issue found, not just the first. */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/** Load `.env` into the process environment. Variables already set win. */
export function loadEnvFile(path?: string): void {
  dotenv.config({ path, override: false });
}

function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isQrFormat(value: string): value is QrCanvasType {
  return QR_FORMATS.some((format) => format === value);
}

/**
 * Resolve settings from parsed flags and environment variables. Flags take
 * precedence over UNIQODE_TOKEN, UNIQODE_ORG_ID and UNIQODE_ENV.
 */
export function loadConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): FlowConfig {
  const problems: string[] = [];

  const positiveInt = (label: string, raw: string | undefined, fallback: number): number => {
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!/^\d+$/.test(raw) || value <= 0) {
      problems.push(`${label} must be a positive integer, got "${raw}"`);
      return fallback;
    }
    return value;
  };

  const apiKey = present(options.token) ?? present(env.UNIQODE_TOKEN);
  if (!apiKey) {
    problems.push('API token is required (--token or UNIQODE_TOKEN)');
  }

  const rawOrgId = present(options.orgId) ?? present(env.UNIQODE_ORG_ID);
  let organizationId = 0;
  if (rawOrgId === undefined) {
    problems.push('Organization id is required (--org-id or UNIQODE_ORG_ID)');
  } else {
    organizationId = positiveInt('Organization id', rawOrgId, 0);
  }

  const rawEnv = present(options.env) ?? present(env.UNIQODE_ENV) ?? 'qa';
  let environment = ENVIRONMENTS.qa;
  if (isEnvironmentName(rawEnv)) {
    environment = ENVIRONMENTS[rawEnv];
  } else {
    problems.push(`Environment must be one of ${ENVIRONMENT_NAMES.join(', ')}, got "${rawEnv}"`);
  }

  const pdfPath = present(options.pdfPath);
  if (!pdfPath) {
    problems.push('--pdf-path is required');
  }

  const linkpageName = options.linkpageName ?? DEFAULT_LINKPAGE_NAME;
  if (!present(linkpageName)) problems.push('Linkpage name must not be empty');
  const qrName = options.qrName ?? DEFAULT_QR_NAME;
  if (!present(qrName)) problems.push('QR code name must not be empty');

  const mediaFolder =
    options.mediaFolder === undefined ? undefined : positiveInt('Media folder', options.mediaFolder, 0);

  let timeoutMs = positiveInt('Timeout', options.timeoutMs, DEFAULT_TIMEOUT_MS);
  if (timeoutMs > MAX_TIMEOUT_MS) {
    problems.push(`Timeout must be at most ${MAX_TIMEOUT_MS} ms, got "${options.timeoutMs}"`);
    timeoutMs = DEFAULT_TIMEOUT_MS;
  }
  const maxAttempts = positiveInt('Max attempts', options.maxAttempts, DEFAULT_STEP_POLICY.maxAttempts);
  const size = positiveInt('QR size', options.qrSize, DEFAULT_QR_DOWNLOAD.size);

  let canvasType = DEFAULT_QR_DOWNLOAD.canvasType;
  if (options.qrFormat !== undefined) {
    if (isQrFormat(options.qrFormat)) {
      canvasType = options.qrFormat;
    } else {
      problems.push(`QR format must be one of ${QR_FORMATS.join(', ')}, got "${options.qrFormat}"`);
    }
  }

  if (problems.length > 0 || !apiKey || !pdfPath) {
    throw new ConfigError(problems);
  }

  return {
    credentials: { apiKey, organizationId },
    environment,
    pdfPath,
    linkpageName,
    qrName,
    mediaFolder,
    deleteAfter: options.deleteAfter,
    outputDir: present(options.outputDir) ?? DEFAULT_OUTPUT_DIR,
    timeoutMs,
    maxAttempts,
    qrDownload: { ...DEFAULT_QR_DOWNLOAD, size, canvasType },
    verbose: options.verbose,
    jsonLogs: options.jsonLogs,
  };
}
