/**
 * Media endpoints: presigned upload target (3), verify (4.1), activate (4.2).
 *
 * The media record moves Pending Upload -> Active. Verification takes the
 * storage UploadReceipt and activation takes the PendingMedia verification
 * returned, so neither can be called out of order.
 */

import { z } from 'zod';
import {
  ActiveMedia,
  MediaStatus,
  MediaUpload,
  PdfFile,
  PendingMedia,
  UploadReceipt,
} from '../domain/entities';
import { FlowError, remoteStateError } from '../domain/errors';
import { StepKey } from '../domain/run';
import { AdapterContext, StepOutcome, decodeBody, expectStatus, idSchema, parseBody } from './response';
import { extractPresignedUpload } from './storage';

/** Media category the vendor expects for documents. */
const DOCUMENT_MEDIA_CONTENT_TYPE = 'application';

export interface SignedUploadRequest {
  /** Optional media folder to file the upload under. */
  folder?: number;
}

const SignedUploadSchema = z.object({ id: idSchema }).passthrough();

export async function requestSignedUpload(
  ctx: AdapterContext,
  request: SignedUploadRequest = {},
): Promise<StepOutcome<MediaUpload>> {
  const payload: Record<string, unknown> = {
    organization: ctx.credentials.organizationId,
    public: true,
    typeform_compatible: null,
  };
  if (request.folder !== undefined) {
    payload.folder = request.folder;
  }
  const res = await ctx.transport.vendor({
    method: 'POST',
    path: '/media/',
    query: { content_type: DOCUMENT_MEDIA_CONTENT_TYPE },
    json: payload,
  });
  expectStatus(StepKey.GetSignedUrl, res, 201);
  const body = decodeBody(res);
  const data = parseBody(StepKey.GetSignedUrl, SignedUploadSchema, body);
  const presigned = extractPresignedUpload(body);
  return {
    status: res.status,
    body,
    output: { media_id: data.id, upload_url: presigned.uploadUrl, fields: presigned.fields },
  };
}

const MediaRecordSchema = z
  .object({
    status: z.string(),
    url: z.string().nullish(),
    media_url: z.string().nullish(),
    name: z.string().nullish(),
    content_type: z.string().nullish(),
    s3_object_key: z.string().nullish(),
  })
  .passthrough();

function assertMediaStatus(stepKey: StepKey, mediaId: number, actual: string, expected: MediaStatus): void {
  if (actual !== expected) {
    throw new FlowError(
      remoteStateError(stepKey, `media ${mediaId} is "${actual}", expected "${expected}"`, {
        media_id: mediaId,
        expectedStatus: expected,
        actualStatus: actual,
      }),
    );
  }
}

export async function verifyMedia(
  ctx: AdapterContext,
  receipt: UploadReceipt,
): Promise<StepOutcome<PendingMedia>> {
  const res = await ctx.transport.vendor({
    method: 'GET',
    path: `/media/${receipt.media_id}/`,
  });
  expectStatus(StepKey.VerifyMedia, res, 200);
  const body = decodeBody(res);
  const data = parseBody(StepKey.VerifyMedia, MediaRecordSchema, body);
  assertMediaStatus(StepKey.VerifyMedia, receipt.media_id, data.status, MediaStatus.PendingUpload);
  return {
    status: res.status,
    body,
    output: {
      media_id: receipt.media_id,
      status: MediaStatus.PendingUpload,
      url: data.url ?? data.media_url ?? '',
    },
  };
}

export async function activateMedia(
  ctx: AdapterContext,
  media: PendingMedia,
  file: PdfFile,
): Promise<StepOutcome<ActiveMedia>> {
  const res = await ctx.transport.vendor({
    method: 'PUT',
    path: `/media/${media.media_id}/`,
    json: {
      id: media.media_id,
      url: media.url,
      status: MediaStatus.Active,
      name: file.name,
      content_type: file.contentType,
      organization: ctx.credentials.organizationId,
      typeform_url: null,
      typeform_compatible: false,
    },
  });
  expectStatus(StepKey.ActivateMedia, res, 200);
  const body = decodeBody(res);
  const data = parseBody(StepKey.ActivateMedia, MediaRecordSchema, body);
  assertMediaStatus(StepKey.ActivateMedia, media.media_id, data.status, MediaStatus.Active);
  return {
    status: res.status,
    body,
    output: {
      media_id: media.media_id,
      status: MediaStatus.Active,
      name: data.name ?? null,
      content_type: data.content_type ?? null,
    },
  };
}
