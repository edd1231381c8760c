import { activateMedia, requestSignedUpload, verifyMedia } from '../../src/adapters/media';
import { MediaStatus, PendingMedia } from '../../src/domain/entities';
import { MEDIA_ID, MEDIA_URL, STORAGE_URL, createFakeVendor } from '../helpers/fake-vendor';
import { adapterContext, failure } from '../helpers/adapter-context';

const file = { path: '/tmp/brochure.pdf', name: 'brochure.pdf', contentType: 'application/pdf' };

describe('requestSignedUpload', () => {
  it('returns the media id and presigned target', async () => {
    const vendor = createFakeVendor();
    const outcome = await requestSignedUpload(adapterContext(vendor));

    expect(outcome.output).toEqual({
      media_id: MEDIA_ID,
      upload_url: STORAGE_URL,
      fields: { key: 'media/303/brochure.pdf', policy: 'test-policy', 'x-amz-signature': 'test-signature' },
    });
    expect(vendor.calls[0].query.get('content_type')).toBe('application');
    expect(vendor.calls[0].json).toEqual({ organization: 949, public: true, typeform_compatible: null });
  });

  it('files the upload in a folder when given one', async () => {
    const vendor = createFakeVendor();
    await requestSignedUpload(adapterContext(vendor), { folder: 12 });
    expect(vendor.calls[0].json).toEqual({ organization: 949, public: true, typeform_compatible: null, folder: 12 });
  });
});

describe('verifyMedia', () => {
  it('accepts media pending upload', async () => {
    const vendor = createFakeVendor();
    const outcome = await verifyMedia(adapterContext(vendor), { media_id: MEDIA_ID, status: 204 });
    expect(outcome.output).toEqual({ media_id: MEDIA_ID, status: MediaStatus.PendingUpload, url: MEDIA_URL });
  });

  it('falls back to media_url', async () => {
    const vendor = createFakeVendor({
      [`GET /media/${MEDIA_ID}/`]: [{ status: 200, json: { status: 'Pending Upload', media_url: 'https://cdn.test/alt.pdf' } }],
    });
    const outcome = await verifyMedia(adapterContext(vendor), { media_id: MEDIA_ID, status: 204 });
    expect(outcome.output.url).toBe('https://cdn.test/alt.pdf');
  });

  it('rejects any other status', async () => {
    const vendor = createFakeVendor({ [`GET /media/${MEDIA_ID}/`]: [{ status: 200, json: { status: 'Failed' } }] });
    const error = await failure(verifyMedia(adapterContext(vendor), { media_id: MEDIA_ID, status: 204 }));
    expect(error.message).toBe('Step 4.1-verify-media: media 303 is "Failed", expected "Pending Upload"');
    expect(error.details).toEqual({ media_id: MEDIA_ID, expectedStatus: 'Pending Upload', actualStatus: 'Failed' });
  });
});

describe('activateMedia', () => {
  const pending: PendingMedia = { media_id: MEDIA_ID, status: MediaStatus.PendingUpload, url: MEDIA_URL };

  it('activates the verified media', async () => {
    const vendor = createFakeVendor();
    const outcome = await activateMedia(adapterContext(vendor), pending, file);
    expect(outcome.output).toEqual({
      media_id: MEDIA_ID,
      status: MediaStatus.Active,
      name: 'brochure.pdf',
      content_type: 'application/pdf',
    });
  });

  it('fails when the media stays pending', async () => {
    const vendor = createFakeVendor({ [`PUT /media/${MEDIA_ID}/`]: [{ status: 200, json: { status: 'Pending Upload' } }] });
    const error = await failure(activateMedia(adapterContext(vendor), pending, file));
    expect(error.kind).toBe('remote_state');
    expect(error.stepId).toBe('4.2-activate-media');
  });
});
