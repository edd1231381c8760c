import { addPdfWidget, createLinkpage, deletePdfWidget, findPdfLink } from '../../src/adapters/linkpage';
import { jsonLogHandler, LogEntry, setLogHandler } from '../../src/logger';
import { LINKPAGE_ID, LINKPAGE_URL, LINK_ID, PDF_URL, createFakeVendor, linksWithPdf } from '../helpers/fake-vendor';
import { adapterContext, failure } from '../helpers/adapter-context';

const linkpage = { linkpage_id: LINKPAGE_ID, linkpage_url: LINKPAGE_URL };
const widgetRequest = { linkpage, pdfUrl: PDF_URL, pdfName: 'brochure.pdf' };
const PAGE_PATH = `/linkpage/${LINKPAGE_ID}/`;

describe('createLinkpage', () => {
  it('creates a linkpage in the organization', async () => {
    const vendor = createFakeVendor();
    const outcome = await createLinkpage(adapterContext(vendor), { name: 'Spring Catalogue' });

    expect(outcome.output).toEqual({ linkpage_id: LINKPAGE_ID, linkpage_url: LINKPAGE_URL });
    expect(vendor.calls[0].json).toEqual({ name: 'Spring Catalogue', organization: 949 });
  });

  it('rejects 200 where 201 is expected', async () => {
    const vendor = createFakeVendor({ 'POST /linkpage/': [{ status: 200, json: { id: 1, url: 'u' } }] });
    const error = await failure(createLinkpage(adapterContext(vendor), { name: 'x' }));
    expect(error.kind).toBe('http_status');
    expect(error.details?.expectedStatus).toBe(201);
  });
});

describe('findPdfLink', () => {
  it('matches the PDF link by url type and pdf_url', () => {
    expect(findPdfLink([
      { id: 1, url_type: 10, field_data: { pdf_url: 'https://q.eddy.pro/pdf/1' } },
      { id: 2, url_type: 10, field_data: { pdf_url: PDF_URL } },
    ], PDF_URL)?.id).toBe(2);
  });

  it('ignores links of another type or without an id', () => {
    expect(findPdfLink([
      { id: 3, url_type: 1, field_data: { pdf_url: PDF_URL } },
      { url_type: 10, field_data: { pdf_url: PDF_URL } },
    ], PDF_URL)).toBeUndefined();
  });
});

describe('addPdfWidget', () => {
  let logs: LogEntry[];

  beforeEach(() => {
    logs = [];
    setLogHandler((entry) => {
      logs.push(entry);
    });
  });

  afterEach(() => {
    setLogHandler(jsonLogHandler);
  });

  it('sends the PDF link and reads the link id from the response', async () => {
    const vendor = createFakeVendor();
    const outcome = await addPdfWidget(adapterContext(vendor), widgetRequest);

    expect(outcome.output.link_id).toBe(LINK_ID);
    expect(outcome.output.links).toHaveLength(2);
    expect(vendor.keys()).toEqual([`PUT ${PAGE_PATH}`]);
    expect(vendor.calls[0].json).toEqual({
      links: [
        {
          url_type: 10,
          deleted: false,
          url: '',
          title: 'brochure.pdf',
          image_type: 1,
          image_url: '',
          field_data: { pdf_url: PDF_URL, pdf_name: 'brochure.pdf' },
        },
      ],
      url: LINKPAGE_URL,
      organization: 949,
    });
  });

  it('reads the linkpage back when the PUT response omits the link', async () => {
    const vendor = createFakeVendor({
      [`PUT ${PAGE_PATH}`]: [{ status: 200, json: { id: LINKPAGE_ID } }],
      [`GET ${PAGE_PATH}`]: [{ status: 200, json: { id: LINKPAGE_ID, links: linksWithPdf() } }],
    });

    const outcome = await addPdfWidget(adapterContext(vendor), widgetRequest);

    expect(vendor.keys()).toEqual([`PUT ${PAGE_PATH}`, `GET ${PAGE_PATH}`]);
    expect(outcome.output.link_id).toBe(LINK_ID);
    expect(outcome.status).toBe(200);
  });

  it('reads the linkpage back when the PUT response has null links', async () => {
    const vendor = createFakeVendor({
      [`PUT ${PAGE_PATH}`]: [{ status: 200, json: { id: LINKPAGE_ID, links: null } }],
      [`GET ${PAGE_PATH}`]: [{ status: 200, json: { id: LINKPAGE_ID, links: linksWithPdf() } }],
    });

    const outcome = await addPdfWidget(adapterContext(vendor), widgetRequest);

    expect(vendor.keys()).toEqual([`PUT ${PAGE_PATH}`, `GET ${PAGE_PATH}`]);
    expect(outcome.output.link_id).toBe(LINK_ID);
    expect(outcome.output.links).toHaveLength(2);
  });

  it('keeps the PUT response when the read-back fails', async () => {
    const vendor = createFakeVendor({
      [`PUT ${PAGE_PATH}`]: [{ status: 200, json: { id: LINKPAGE_ID, links: [] } }],
      [`GET ${PAGE_PATH}`]: [{ status: 500, body: 'error' }],
    });

    const error = await failure(addPdfWidget(adapterContext(vendor), widgetRequest));

    expect(error.kind).toBe('remote_state');
    expect(error.message).toBe(`Step 5-add-pdf-to-linkpage: linkpage lists no PDF link for ${PDF_URL}`);
    const warning = logs.find((entry) => entry.message === 'Linkpage read-back failed, using PUT response');
    expect(warning?.context?.status).toBe(500);
  });
});

describe('deletePdfWidget', () => {
  const widget = { link_id: LINK_ID, pdf_url: PDF_URL, links: [] };

  it('deletes only the link it was given', async () => {
    const vendor = createFakeVendor();
    const outcome = await deletePdfWidget(adapterContext(vendor), { linkpage, widget });

    expect(outcome.output).toEqual({ deleted_link_id: LINK_ID, links: [{ id: 1, url_type: 1, title: 'Home' }] });
    expect(vendor.calls[0].json).toEqual({ deleted_links: [LINK_ID], links: [], url: LINKPAGE_URL, organization: 949 });
  });

  it('fails when the link is still listed', async () => {
    const vendor = createFakeVendor({ [`PUT ${PAGE_PATH}`]: [{ status: 200, json: { links: linksWithPdf() } }] });
    const error = await failure(deletePdfWidget(adapterContext(vendor), { linkpage, widget }));
    expect(error.kind).toBe('remote_state');
    expect(error.stepId).toBe('6-delete-pdf-from-linkpage');
  });
});
