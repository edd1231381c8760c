import { z } from 'zod';
import { decodeBody, expectStatus, idSchema, parseBody } from '../../src/adapters/response';
import { FlowError } from '../../src/domain/errors';
import { StepKey } from '../../src/domain/run';
import { HttpResponse } from '../../src/transport/http-transport';

function response(status: number, text: string): HttpResponse {
  return {
    method: 'POST',
    url: 'https://api.test/linkpage/?organization=949',
    status,
    contentType: 'application/json',
    bytes: Buffer.from(text),
  };
}

function thrown(fn: () => unknown): FlowError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FlowError) return err;
    throw err;
  }
  throw new Error('expected a FlowError');
}

describe('decodeBody', () => {
  it('decodes a JSON object', () => {
    expect(decodeBody(response(200, '{"id":5,"url":"u"}'))).toEqual({ id: 5, url: 'u' });
  });

  it('decodes an empty body as an empty record', () => {
    expect(decodeBody(response(204, ''))).toEqual({});
  });

  it('wraps non-object JSON', () => {
    expect(decodeBody(response(200, '[1,2]'))).toEqual({ items: [1, 2] });
  });

  it('keeps non-JSON text as raw', () => {
    expect(decodeBody(response(502, '<html>Bad Gateway</html>'))).toEqual({ raw: '<html>Bad Gateway</html>' });
  });
});

describe('expectStatus', () => {
  it('accepts the expected status', () => {
    expect(() => expectStatus(StepKey.CreateLinkpage, response(201, '{}'), 201)).not.toThrow();
  });

  it('rejects any other status, 2xx included', () => {
    const err = thrown(() => expectStatus(StepKey.CreateLinkpage, response(200, '{"id":1}'), 201));
    expect(err.typedError.kind).toBe('http_status');
    expect(err.typedError.details).toEqual({
      method: 'POST',
      url: 'https://api.test/linkpage/?organization=949',
      expectedStatus: 201,
      statusCode: 200,
      body: '{"id":1}',
    });
  });
});

describe('parseBody', () => {
  const schema = z.object({ id: idSchema, url: z.string() });

  it('returns the parsed data', () => {
    expect(parseBody(StepKey.CreateLinkpage, schema, { id: '42', url: 'u' })).toEqual({ id: 42, url: 'u' });
  });

  it('reports a missing field as remote state', () => {
    const err = thrown(() => parseBody(StepKey.CreateLinkpage, schema, { id: 42 }));
    expect(err.typedError.kind).toBe('remote_state');
    expect(err.typedError.stepId).toBe('1-create-linkpage');
    expect(err.typedError.details?.issues).toEqual(['url: Required']);
  });
});

describe('idSchema', () => {
  it('accepts integers and digit strings', () => {
    expect(idSchema.parse(7)).toBe(7);
    expect(idSchema.parse('7')).toBe(7);
  });

  it('rejects anything else', () => {
    expect(idSchema.safeParse('abc').success).toBe(false);
    expect(idSchema.safeParse(1.5).success).toBe(false);
    expect(idSchema.safeParse(null).success).toBe(false);
  });
});
