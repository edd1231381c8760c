import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RESULTS_FILE_NAME, createFileStore } from '../../src/storage/file-store';
import { qrImageFileName } from '../../src/storage/store';
import { FlowPhase, FlowRun } from '../../src/domain/run';

function makeRun(runId: string): FlowRun {
  return {
    runId,
    state: FlowPhase.Failed,
    environment: 'qa',
    apiBaseUrl: 'https://api.test',
    pdfBaseUrl: 'https://pdf.test',
    organizationId: 949,
    cleanupRequested: true,
    startedAt: '2026-01-01T00:00:00Z',
    transitions: [FlowPhase.NotStarted, FlowPhase.Failed],
    stepResults: {},
    flow: {},
  };
}

describe('createFileStore', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'linkpage-store-')), 'out');
  });

  afterEach(() => {
    fs.rmSync(path.dirname(outputDir), { recursive: true, force: true });
  });

  it('writes flow_results.json, creating the directory', async () => {
    const store = createFileStore(outputDir);
    const location = await store.results.save(makeRun('run_a'));

    expect(location).toBe(path.join(path.resolve(outputDir), RESULTS_FILE_NAME));
    const written = fs.readFileSync(location, 'utf-8');
    expect(written).toBe(JSON.stringify(makeRun('run_a'), null, 2));
  });

  it('finds the most recent run only', async () => {
    const store = createFileStore(outputDir);
    await store.results.save(makeRun('run_a'));
    await store.results.save(makeRun('run_b'));

    expect(await store.results.getById('run_a')).toBeNull();
    expect((await store.results.getById('run_b'))?.cleanupRequested).toBe(true);
  });

  it('returns null before anything was saved', async () => {
    expect(await createFileStore(outputDir).results.getById('run_a')).toBeNull();
  });

  it('writes and reads artifacts', async () => {
    const store = createFileStore(outputDir);
    const name = qrImageFileName(202, 'svg');

    const stored = await store.artifacts.write(name, Buffer.from('<svg/>'));

    expect(name).toBe('qr_202.svg');
    expect(stored.location).toBe(path.join(path.resolve(outputDir), 'qr_202.svg'));
    expect(stored.bytes).toBe(6);
    expect((await store.artifacts.read(name))?.toString()).toBe('<svg/>');
    expect(await store.artifacts.read('qr_1.svg')).toBeNull();
  });

  it('rethrows read errors other than a missing file', async () => {
    const store = createFileStore(outputDir);
    fs.mkdirSync(path.join(outputDir, 'qr_7.png'), { recursive: true });

    await expect(store.artifacts.read('qr_7.png')).rejects.toMatchObject({ code: 'EISDIR' });
  });

  it('refuses names that leave the output directory', async () => {
    const store = createFileStore(outputDir);
    await expect(store.artifacts.write('../escape.pdf', Buffer.from('x'))).rejects.toThrow(
      'Artifact name must be a plain file name: "../escape.pdf"',
    );
  });
});
