/**
 * Local snapshots of remote entities. Every identifier is assigned by the
 * vendor; these types only record what a step returned.
 */

/** Widget type for a PDF link on a linkpage. */
export const PDF_URL_TYPE = 10;

/** Lifecycle of a media record. */
export enum MediaStatus {
  PendingUpload = 'Pending Upload',
  Active = 'Active',
}

export interface Linkpage {
  linkpage_id: number;
  linkpage_url: string;
}

export interface QrCode {
  qr_code_id: number;
}

export interface QrDetails {
  qr_code_id: number;
  qr_url: string | null;
  name: string | null;
}

export type QrCanvasType = 'pdf' | 'png' | 'svg';

export interface QrImage {
  qr_code_id: number;
  path: string;
  bytes: number;
  content_type: string | null;
}

/** Presigned storage target issued for a new media record. */
export interface MediaUpload {
  media_id: number;
  upload_url: string;
  /** Opaque presigned form fields; `key` is always present. */
  fields: Record<string, string>;
}

/** Proof that the raw bytes were accepted by storage. */
export interface UploadReceipt {
  media_id: number;
  status: number;
}

export interface PendingMedia {
  media_id: number;
  status: MediaStatus.PendingUpload;
  /** Media URL reported by the vendor, echoed back on activation. */
  url: string;
}

export interface ActiveMedia {
  media_id: number;
  status: MediaStatus.Active;
  name: string | null;
  content_type: string | null;
}

/** A link entry as listed on a linkpage. */
export interface LinkpageLink {
  id?: number;
  url_type?: number;
  title?: string;
  field_data?: Record<string, unknown>;
  [field: string]: unknown;
}

export interface PdfWidget {
  link_id: number;
  pdf_url: string;
  links: LinkpageLink[];
}

export interface WidgetRemoval {
  deleted_link_id: number;
  links: LinkpageLink[];
}

/** The local PDF the flow publishes. */
export interface PdfFile {
  path: string;
  name: string;
  contentType: string;
}
