/**
 * QR code endpoints: create (2), details (2.1), image download (2.2).
 */

import { z } from 'zod';
import { Linkpage, QrCanvasType, QrCode, QrDetails } from '../domain/entities';
import { StepKey } from '../domain/run';
import { AdapterContext, StepOutcome, decodeBody, expectStatus, idSchema, parseBody } from './response';

/** Campaign content type for a linkpage target. */
const LINKPAGE_CAMPAIGN_CONTENT_TYPE = 18;
/** Dynamic QR code. */
const DYNAMIC_QR_TYPE = 2;

export const DEFAULT_QR_TIMEZONE = 'Asia/Calcutta';

export interface CreateQrCodeRequest {
  linkpage: Linkpage;
  name: string;
  timezone?: string;
}

const QrCreatedSchema = z.object({ id: idSchema }).passthrough();

export async function createQrCode(
  ctx: AdapterContext,
  request: CreateQrCodeRequest,
): Promise<StepOutcome<QrCode>> {
  const organization = ctx.credentials.organizationId;
  const res = await ctx.transport.vendor({
    method: 'POST',
    path: '/qrcodes/',
    json: {
      campaign: {
        content_type: LINKPAGE_CAMPAIGN_CONTENT_TYPE,
        campaign_active: true,
        timezone: request.timezone ?? DEFAULT_QR_TIMEZONE,
        organization,
        link_page: request.linkpage.linkpage_id,
        age_gate: 0,
      },
      qr_type: DYNAMIC_QR_TYPE,
      organization,
      name: request.name,
    },
  });
  expectStatus(StepKey.CreateQrCode, res, 201);
  const body = decodeBody(res);
  const data = parseBody(StepKey.CreateQrCode, QrCreatedSchema, body);
  return { status: res.status, body, output: { qr_code_id: data.id } };
}

const QrDetailsSchema = z
  .object({
    id: idSchema.optional(),
    name: z.string().nullish(),
    url: z.string().nullish(),
  })
  .passthrough();

/** Read-only; repeated calls with the same id return the same `qr_url`. */
export async function getQrDetails(
  ctx: AdapterContext,
  qrCode: QrCode,
): Promise<StepOutcome<QrDetails>> {
  const res = await ctx.transport.vendor({
    method: 'GET',
    path: `/qrcodes/${qrCode.qr_code_id}`,
  });
  expectStatus(StepKey.GetQrDetails, res, 200);
  const body = decodeBody(res);
  const data = parseBody(StepKey.GetQrDetails, QrDetailsSchema, body);
  return {
    status: res.status,
    body,
    output: {
      qr_code_id: qrCode.qr_code_id,
      qr_url: data.url ?? null,
      name: data.name ?? null,
    },
  };
}

export interface QrDownloadOptions {
  size: number;
  errorCorrectionLevel: number;
  canvasType: QrCanvasType;
}

export const DEFAULT_QR_DOWNLOAD: QrDownloadOptions = {
  size: 1024,
  errorCorrectionLevel: 2,
  canvasType: 'pdf',
};

export interface QrImagePayload {
  qr_code_id: number;
  bytes: Buffer;
  content_type: string | null;
  extension: QrCanvasType;
}

export async function downloadQrImage(
  ctx: AdapterContext,
  qrCode: QrCode,
  options: QrDownloadOptions = DEFAULT_QR_DOWNLOAD,
): Promise<StepOutcome<QrImagePayload>> {
  const res = await ctx.transport.vendor({
    method: 'GET',
    path: `/qrcodes/${qrCode.qr_code_id}/download/`,
    accept: '*/*',
    query: {
      size: options.size,
      error_correction_level: options.errorCorrectionLevel,
      canvas_type: options.canvasType,
    },
  });
  expectStatus(StepKey.DownloadQrImage, res, 200);
  return {
    status: res.status,
    body: { content_type: res.contentType, bytes: res.bytes.length },
    output: {
      qr_code_id: qrCode.qr_code_id,
      bytes: res.bytes,
      content_type: res.contentType,
      extension: options.canvasType,
    },
  };
}
