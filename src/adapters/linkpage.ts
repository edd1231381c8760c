/**
 * Linkpage endpoints: create (1), attach PDF widget (5), delete widget (6).
 */

import { z } from 'zod';
import {
  Linkpage,
  LinkpageLink,
  PDF_URL_TYPE,
  PdfWidget,
  WidgetRemoval,
} from '../domain/entities';
import { FlowError, remoteStateError } from '../domain/errors';
import { StepKey } from '../domain/run';
import { logger } from '../logger';
import { AdapterContext, StepOutcome, decodeBody, expectStatus, idSchema, parseBody } from './response';

const log = logger.child({ module: 'adapters.linkpage' });

/** Widget icon style used for PDF links. */
const PDF_IMAGE_TYPE = 1;

const LinkpageCreatedSchema = z
  .object({
    id: idSchema,
    url: z.string().min(1),
  })
  .passthrough();

export async function createLinkpage(
  ctx: AdapterContext,
  request: { name: string },
): Promise<StepOutcome<Linkpage>> {
  const res = await ctx.transport.vendor({
    method: 'POST',
    path: '/linkpage/',
    json: { name: request.name, organization: ctx.credentials.organizationId },
  });
  expectStatus(StepKey.CreateLinkpage, res, 201);
  const body = decodeBody(res);
  const data = parseBody(StepKey.CreateLinkpage, LinkpageCreatedSchema, body);
  return {
    status: res.status,
    body,
    output: { linkpage_id: data.id, linkpage_url: data.url },
  };
}

const LinkSchema = z
  .object({
    id: idSchema.optional(),
    url_type: z.number().optional(),
    title: z.string().optional(),
    field_data: z.record(z.unknown()).nullish(),
  })
  .passthrough();

const LinkpageLinksSchema = z
  .object({
    links: z.array(LinkSchema).nullish(),
  })
  .passthrough();

function toLinks(parsed: z.infer<typeof LinkpageLinksSchema>): LinkpageLink[] {
  return (parsed.links ?? []).map((link) => ({
    ...link,
    field_data: link.field_data ?? undefined,
  }));
}

/** The link on the page that serves the given PDF, if listed. */
export function findPdfLink(links: LinkpageLink[], pdfUrl: string): LinkpageLink | undefined {
  return links.find(
    (link) => link.url_type === PDF_URL_TYPE && link.field_data?.pdf_url === pdfUrl && typeof link.id === 'number',
  );
}

export interface AddPdfWidgetRequest {
  linkpage: Linkpage;
  pdfUrl: string;
  pdfName: string;
}

/**
 * Add a PDF link to the linkpage. When the PUT response does not list the
 * new link, the linkpage is read back; if that read fails the PUT body is
 * used as-is.
 */
export async function addPdfWidget(
  ctx: AdapterContext,
  request: AddPdfWidgetRequest,
): Promise<StepOutcome<PdfWidget>> {
  const path = `/linkpage/${request.linkpage.linkpage_id}/`;
  const res = await ctx.transport.vendor({
    method: 'PUT',
    path,
    json: {
      links: [
        {
          url_type: PDF_URL_TYPE,
          deleted: false,
          url: '',
          title: request.pdfName,
          image_type: PDF_IMAGE_TYPE,
          image_url: '',
          field_data: {
            pdf_url: request.pdfUrl,
            pdf_name: request.pdfName,
          },
        },
      ],
      url: request.linkpage.linkpage_url,
      organization: ctx.credentials.organizationId,
    },
  });
  expectStatus(StepKey.AddPdfWidget, res, 200);

  let body = decodeBody(res);
  let links = toLinks(parseBody(StepKey.AddPdfWidget, LinkpageLinksSchema, body));

  if (!findPdfLink(links, request.pdfUrl)) {
    const readBack = await ctx.transport.vendor({ method: 'GET', path });
    if (readBack.status === 200) {
      body = decodeBody(readBack);
      links = toLinks(parseBody(StepKey.AddPdfWidget, LinkpageLinksSchema, body));
    } else {
      log.warn('Linkpage read-back failed, using PUT response', {
        linkpage_id: request.linkpage.linkpage_id,
        status: readBack.status,
      });
    }
  }

  const link = findPdfLink(links, request.pdfUrl);
  if (!link || typeof link.id !== 'number') {
    throw new FlowError(
      remoteStateError(StepKey.AddPdfWidget, `linkpage lists no PDF link for ${request.pdfUrl}`, {
        linkpage_id: request.linkpage.linkpage_id,
        links,
      }),
    );
  }

  return {
    status: res.status,
    body,
    output: { link_id: link.id, pdf_url: request.pdfUrl, links },
  };
}

export interface DeletePdfWidgetRequest {
  linkpage: Linkpage;
  widget: PdfWidget;
}

/** Remove the widget created by step 5 and confirm it is gone from the page. */
export async function deletePdfWidget(
  ctx: AdapterContext,
  request: DeletePdfWidgetRequest,
): Promise<StepOutcome<WidgetRemoval>> {
  const res = await ctx.transport.vendor({
    method: 'PUT',
    path: `/linkpage/${request.linkpage.linkpage_id}/`,
    json: {
      deleted_links: [request.widget.link_id],
      links: [],
      url: request.linkpage.linkpage_url,
      organization: ctx.credentials.organizationId,
    },
  });
  expectStatus(StepKey.DeletePdfWidget, res, 200);
  const body = decodeBody(res);
  const links = toLinks(parseBody(StepKey.DeletePdfWidget, LinkpageLinksSchema, body));

  if (links.some((link) => link.id === request.widget.link_id)) {
    throw new FlowError(
      remoteStateError(StepKey.DeletePdfWidget, `link ${request.widget.link_id} is still listed after deletion`, {
        linkpage_id: request.linkpage.linkpage_id,
        link_id: request.widget.link_id,
      }),
    );
  }

  return {
    status: res.status,
    body,
    output: { deleted_link_id: request.widget.link_id, links },
  };
}
