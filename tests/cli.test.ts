import { EXIT_COMPLETED, EXIT_USAGE, main } from '../src/cli';

describe('main', () => {
  let errors: string[];
  let output: string[];
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    errors = [];
    output = [];
    errorSpy = jest.spyOn(console, 'error').mockImplementation((line: string) => {
      errors.push(line);
    });
    logSpy = jest.spyOn(console, 'log').mockImplementation((line: string) => {
      output.push(line);
    });
  });

  afterEach(() => {
    errorSpy.mockRestore();
    logSpy.mockRestore();
  });

  it('prints usage for --help', async () => {
    expect(await main(['node', 'linkpage-pdf-flow', '--help'])).toBe(EXIT_COMPLETED);
    expect(output[0].startsWith('Usage:')).toBe(true);
  });

  it('exits with the usage code on a bad argument', async () => {
    expect(await main(['node', 'linkpage-pdf-flow', '--colour'])).toBe(EXIT_USAGE);
    expect(errors[0]).toBe('Error: Unknown argument "--colour"');
  });

  it('exits with the usage code on invalid configuration', async () => {
    const code = await main(['node', 'linkpage-pdf-flow', '--pdf-path', 'a.pdf', '--token', 'test-token', '--org-id', '1', '--env', 'staging']);
    expect(code).toBe(EXIT_USAGE);
    expect(errors[0]).toBe('Invalid configuration:\n  - Environment must be one of qa, prod, got "staging"');
  });
});
