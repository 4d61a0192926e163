import { Readable } from 'node:stream';

import { Dispatcher, MockAgent } from 'undici';

import {
  Fields,
  HttpClient,
  HttpRequest,
  ReadableInputStream,
  TransportFailure,
  UndiciTransport,
  toOutgoingRequest,
  toTransportFailure,
} from '../../src';

/**
 * Takes the first body chunk, then fails the exchange the way a peer reset does mid-upload
 */
class ResettingDispatcher extends Dispatcher {
  override dispatch(options: Dispatcher.DispatchOptions, handler: Dispatcher.DispatchHandlers): boolean {
    const body = options.body;
    if (!(body instanceof Readable)) {
      handler.onError?.(new Error('Expected a streamed request body'));
      return true;
    }
    body.once('data', () => {
      body.destroy();
      handler.onError?.(Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }));
    });
    return true;
  }
}

const text = (bytes: Uint8Array | null) => (bytes === null ? null : Buffer.from(bytes).toString('utf8'));

describe('UndiciTransport', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  it('should send a GET and expose status, headers and body', async () => {
    mockAgent
      .get('https://catalog.example.com')
      .intercept({ path: '/api/items/1', method: 'GET' })
      .reply(200, '{"id":"1"}', { headers: { 'content-type': 'application/json', 'content-length': '10' } });
    const client = new HttpClient({ transport: new UndiciTransport({ dispatcher: mockAgent }) });

    const response = await client.send(new HttpRequest('GET', 'https://catalog.example.com/api/items/1'));

    expect(response.statusCode).toBe(200);
    expect(response.headers.firstText('Content-Type')).toBe('application/json');
    expect(response.headers.isImmutable).toBe(true);
    expect(await response.json()).toEqual({ id: '1' });
  });

  it('should forward request headers', async () => {
    mockAgent
      .get('https://catalog.example.com')
      .intercept({ path: '/me', method: 'GET', headers: { authorization: 'Bearer test-token' } })
      .reply(204, '');
    const client = new HttpClient({ transport: new UndiciTransport({ dispatcher: mockAgent }) });

    const response = await client.send(
      new HttpRequest('GET', 'https://catalog.example.com/me').withHeader('Authorization', 'Bearer test-token')
    );

    expect(response.statusCode).toBe(204);
    expect(await response.bytes()).toEqual(new Uint8Array(0));
  });

  it('should follow one redirect across origins', async () => {
    mockAgent
      .get('https://old.example.com')
      .intercept({ path: '/feed', method: 'GET' })
      .reply(301, 'moved', { headers: { location: 'https://new.example.com/feed' } });
    mockAgent.get('https://new.example.com').intercept({ path: '/feed', method: 'GET' }).reply(200, 'fresh');
    const client = new HttpClient({ transport: new UndiciTransport({ dispatcher: mockAgent }) });

    const response = await client.send(new HttpRequest('GET', 'https://old.example.com/feed'));

    expect(response.statusCode).toBe(200);
    expect(await response.text()).toBe('fresh');
  });

  it('should stream a request body with its Content-Length', async () => {
    const body = new Uint8Array(10_000).map((_, index) => index % 251);
    let receivedHeaders: unknown;
    mockAgent
      .get('https://catalog.example.com')
      .intercept({ path: '/upload', method: 'PUT' })
      .reply(200, async (options) => {
        receivedHeaders = options.headers;
        const chunks: Buffer[] = [];
        if (options.body instanceof Readable) {
          for await (const chunk of options.body) {
            chunks.push(Buffer.from(chunk));
          }
        }
        return Buffer.concat(chunks);
      });
    const client = new HttpClient({ transport: new UndiciTransport({ dispatcher: mockAgent }) });

    const response = await client.send(new HttpRequest('PUT', 'https://catalog.example.com/upload').withBody(body));

    expect(receivedHeaders).toMatchObject({ 'content-length': '10000' });
    expect(Buffer.from(await response.bytes())).toEqual(Buffer.from(body));
  });

  it('should keep the connection code when the peer resets during upload', async () => {
    const client = new HttpClient({ transport: new UndiciTransport({ dispatcher: new ResettingDispatcher() }) });
    const body = new Uint8Array(1024 * 1024);

    await expect(
      client.send(new HttpRequest('POST', 'https://catalog.example.com/upload').withBody(body))
    ).rejects.toMatchObject({
      code: 'transport_error',
      transportCode: { type: 'connection_reset' },
    });
  });

  it('should map connection errors to transport codes', async () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });
    mockAgent.get('https://down.example.com').intercept({ path: '/', method: 'GET' }).replyWithError(refused);
    const client = new HttpClient({ transport: new UndiciTransport({ dispatcher: mockAgent }) });

    await expect(client.send(new HttpRequest('GET', 'https://down.example.com/'))).rejects.toMatchObject({
      code: 'transport_error',
      transportCode: { type: 'connection_refused' },
    });
  });

  it('should refuse schemes other than http and https', () => {
    const transport = new UndiciTransport({ dispatcher: mockAgent });
    const outgoing = toOutgoingRequest(new URL('ftp://files.example.com/pub'), 'GET', Fields.fromList([]), false);

    expect(() => transport.handle(outgoing)).toThrow('Unsupported scheme "ftp"');
  });

  it('should refuse methods undici cannot send', () => {
    const transport = new UndiciTransport({ dispatcher: mockAgent });
    const outgoing = toOutgoingRequest(new URL('https://api.example.com/pot'), 'BREW', Fields.fromList([]), false);

    try {
      transport.handle(outgoing);
      throw new Error('expected handle to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(TransportFailure);
      expect((err as TransportFailure).code).toEqual({ type: 'http_request_method_invalid' });
    }
  });
});

describe('ReadableInputStream', () => {
  it('should split chunks larger than the requested size', async () => {
    const stream = new ReadableInputStream(Readable.from([Buffer.from('hello'), Buffer.from('world')]));

    expect(text(await stream.read(3))).toBe('hel');
    expect(text(await stream.read(10))).toBe('lo');
    expect(text(await stream.read(10))).toBe('world');
    expect(await stream.read(10)).toBeNull();
  });

  it('should reject non-positive read sizes', async () => {
    const stream = new ReadableInputStream(Readable.from([]));

    await expect(stream.read(0)).rejects.toThrow(RangeError);
  });

  it('should turn stream errors into transport failures', async () => {
    const failing = new Readable({
      read() {
        this.destroy(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }));
      },
    });
    const stream = new ReadableInputStream(failing);

    await expect(stream.read(10)).rejects.toMatchObject({ code: { type: 'connection_reset' } });
  });
});

describe('toTransportFailure()', () => {
  it.each([
    ['ENOTFOUND', { type: 'dns_error', rcode: 'ENOTFOUND' }],
    ['EAI_AGAIN', { type: 'dns_timeout' }],
    ['UND_ERR_CONNECT_TIMEOUT', { type: 'connection_timeout' }],
    ['UND_ERR_SOCKET', { type: 'connection_terminated' }],
    ['HPE_INVALID_CONSTANT', { type: 'http_protocol_error' }],
    ['ERR_SSL_WRONG_VERSION_NUMBER', { type: 'tls_protocol_error' }],
    ['CERT_HAS_EXPIRED', { type: 'tls_certificate_error' }],
  ])('should map %s', (code, expected) => {
    const error = Object.assign(new Error(`failed with ${code}`), { code });

    expect(toTransportFailure(error).code).toEqual(expected);
  });

  it('should fall back to internal_error with the message', () => {
    expect(toTransportFailure(new Error('mystery')).code).toEqual({ type: 'internal_error', message: 'mystery' });
  });
});
