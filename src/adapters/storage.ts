/**
 * Object storage upload (4) through a presigned POST.
 *
 * The vendor's signed-upload response has shipped its presigned fields in
 * several shapes: nested under `fields`, `s3_fields` or `upload_fields`, or
 * flattened at the top level with lower-case or snake-case names.
 */

import { MediaUpload, PdfFile, UploadReceipt } from '../domain/entities';
import { FlowError, remoteStateError } from '../domain/errors';
import { StepKey } from '../domain/run';
import { AdapterContext, StepOutcome, decodeBody, expectStatus } from './response';

/** Response keys that may carry the storage target URL, in priority order. */
const UPLOAD_URL_KEYS = ['post_action_url', 'upload_url', 's3_url', 'url'] as const;

/** Response keys that may carry the nested presigned field map. */
const NESTED_FIELD_KEYS = ['fields', 's3_fields', 'upload_fields'] as const;

/** Canonical form field name -> accepted top-level spellings. */
const PRESIGNED_FIELD_ALIASES: Record<string, readonly string[]> = {
  key: ['key'],
  Policy: ['Policy', 'policy'],
  'X-Amz-Algorithm': ['X-Amz-Algorithm', 'x-amz-algorithm', 'x_amz_algorithm'],
  'X-Amz-Credential': ['X-Amz-Credential', 'x-amz-credential', 'x_amz_credential'],
  'X-Amz-Date': ['X-Amz-Date', 'x-amz-date', 'x_amz_date'],
  'X-Amz-Signature': ['X-Amz-Signature', 'x-amz-signature', 'x_amz_signature'],
  'X-Amz-Security-Token': ['X-Amz-Security-Token', 'x-amz-security-token', 'x_amz_security_token'],
};

/** Storage answers a presigned POST with 204 unless the policy asks otherwise. */
export const DEFAULT_UPLOAD_STATUS = 204;

export interface PresignedUpload {
  uploadUrl: string;
  fields: Record<string, string>;
}

function toFieldValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

function nestedFields(body: Record<string, unknown>): Record<string, string> | undefined {
  for (const key of NESTED_FIELD_KEYS) {
    const candidate = body[key];
    if (typeof candidate !== 'object' || candidate === null || Array.isArray(candidate)) continue;
    const fields: Record<string, string> = {};
    for (const [name, value] of Object.entries(candidate)) {
      const fieldValue = toFieldValue(value);
      if (fieldValue !== undefined) fields[name] = fieldValue;
    }
    if (Object.keys(fields).length > 0) return fields;
  }
  return undefined;
}

function topLevelFields(body: Record<string, unknown>): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [canonical, aliases] of Object.entries(PRESIGNED_FIELD_ALIASES)) {
    for (const alias of aliases) {
      const fieldValue = toFieldValue(body[alias]);
      if (fieldValue !== undefined) {
        fields[canonical] = fieldValue;
        break;
      }
    }
  }
  return fields;
}

/** Pull the storage target and presigned fields out of a signed-upload response. */
export function extractPresignedUpload(body: Record<string, unknown>): PresignedUpload {
  let uploadUrl: string | undefined;
  for (const key of UPLOAD_URL_KEYS) {
    const candidate = body[key];
    if (typeof candidate === 'string' && candidate.length > 0) {
      uploadUrl = candidate;
      break;
    }
  }
  if (!uploadUrl) {
    throw new FlowError(
      remoteStateError(StepKey.GetSignedUrl, 'no storage upload URL in the signed-upload response', {
        responseKeys: Object.keys(body),
      }),
    );
  }

  const fields = nestedFields(body) ?? topLevelFields(body);
  if (!fields.key) {
    throw new FlowError(
      remoteStateError(StepKey.GetSignedUrl, "no presigned 'key' field in the signed-upload response", {
        responseKeys: Object.keys(body),
        fieldNames: Object.keys(fields),
      }),
    );
  }

  return { uploadUrl, fields };
}

/** Status the storage target answers with, honoring `success_action_status`. */
export function expectedUploadStatus(fields: Record<string, string>): number {
  const requested = Number(fields.success_action_status);
  return Number.isInteger(requested) && requested >= 200 && requested < 300 ? requested : DEFAULT_UPLOAD_STATUS;
}

/**
 * Build the multipart form in the order storage requires: `key` first,
 * then the remaining presigned fields, the content type, and the file last.
 */
export function buildUploadForm(upload: MediaUpload, file: PdfFile, bytes: Buffer): FormData {
  const form = new FormData();
  form.append('key', upload.fields.key);
  for (const [name, value] of Object.entries(upload.fields)) {
    if (name === 'key' || name === 'Content-Type') continue;
    form.append(name, value);
  }
  form.append('Content-Type', upload.fields['Content-Type'] ?? file.contentType);
  form.append('file', new Blob([new Uint8Array(bytes)], { type: file.contentType }), file.name);
  return form;
}

export async function uploadToStorage(
  ctx: AdapterContext,
  upload: MediaUpload,
  file: PdfFile,
  bytes: Buffer,
): Promise<StepOutcome<UploadReceipt>> {
  const res = await ctx.transport.storageUpload(upload.upload_url, buildUploadForm(upload, file, bytes));
  expectStatus(StepKey.UploadToStorage, res, expectedUploadStatus(upload.fields));
  return {
    status: res.status,
    body: decodeBody(res),
    output: { media_id: upload.media_id, status: res.status },
  };
}
