import {
  TidewireError,
  TidewireHttpError,
  TransportFailure,
  createHeaderError,
  createSerializationError,
  createTransportError,
  describeTransportErrorCode,
  isTidewireError,
  isTidewireHttpError,
  normalizeError,
  toTransportErrorCode,
} from '../../src';

describe('HTTP errors', () => {
  describe('factories', () => {
    it('should create serialization errors with the cause message', () => {
      const cause = new SyntaxError('Unexpected end of JSON input');
      const error = createSerializationError(cause);

      expect(error.code).toBe('serialization_error');
      expect(error.message).toBe('JSON serialization error: Unexpected end of JSON input');
      expect(error.cause).toBe(cause);
    });

    it('should create header errors naming the header', () => {
      const error = createHeaderError('Host', 'forbidden');

      expect(error.toString()).toBe('TidewireHttpError [header_error]: Header error: forbidden header ("Host")\n  Header: Host');
    });

    it('should create transport errors carrying the code', () => {
      const error = createTransportError({ type: 'tls_certificate_error' });

      expect(error.toJSON()).toEqual({
        name: 'TidewireHttpError',
        code: 'transport_error',
        message: 'HTTP error: tls certificate error',
        transportCode: { type: 'tls_certificate_error' },
      });
    });
  });

  describe('describeTransportErrorCode()', () => {
    it.each([
      [{ type: 'dns_error' } as const, 'DNS error'],
      [{ type: 'dns_error', rcode: 'SERVFAIL' } as const, 'DNS error (SERVFAIL)'],
      [{ type: 'internal_error' } as const, 'internal error'],
      [{ type: 'internal_error', message: 'boom' } as const, 'internal error: boom'],
      [{ type: 'http_response_incomplete' } as const, 'http response incomplete'],
    ])('should render %p', (code, expected) => {
      expect(describeTransportErrorCode(code)).toBe(expected);
    });
  });

  describe('toTransportErrorCode()', () => {
    it('should return the original code for transport errors', () => {
      const code = { type: 'connection_reset' } as const;

      expect(toTransportErrorCode(createTransportError(code))).toBe(code);
    });

    it('should collapse serialization errors into internal_error with the message', () => {
      const error = createSerializationError(new Error('bad token'));

      expect(toTransportErrorCode(error)).toEqual({
        type: 'internal_error',
        message: 'JSON serialization error: bad token',
      });
    });

    it('should collapse header errors into internal_error with the message', () => {
      expect(toTransportErrorCode(createHeaderError('X Bad', 'invalid_syntax'))).toEqual({
        type: 'internal_error',
        message: 'Header error: invalid syntax ("X Bad")',
      });
    });

    it('should pass raw transport failures through', () => {
      expect(toTransportErrorCode(new TransportFailure({ type: 'destination_not_found' }))).toEqual({
        type: 'destination_not_found',
      });
    });

    it('should wrap anything else as internal_error', () => {
      expect(toTransportErrorCode('plain string')).toEqual({ type: 'internal_error', message: 'plain string' });
    });
  });

  describe('normalizeError()', () => {
    it('should keep TidewireHttpError instances', () => {
      const error = createHeaderError('X', 'immutable');

      expect(normalizeError(error)).toBe(error);
    });

    it('should convert transport failures', () => {
      const failure = new TransportFailure({ type: 'http_protocol_error' }, 'bad framing');
      const error = normalizeError(failure);

      expect(error.transportCode).toEqual({ type: 'http_protocol_error' });
      expect(error.cause).toBe(failure);
    });

    it('should treat unknown errors as internal transport errors', () => {
      const error = normalizeError(new Error('unexpected'));

      expect(error.code).toBe('transport_error');
      expect(error.transportCode).toEqual({ type: 'internal_error', message: 'unexpected' });
    });
  });

  describe('type guards', () => {
    it('should recognize the error hierarchy', () => {
      const error = createSerializationError(new Error('x'));

      expect(isTidewireHttpError(error)).toBe(true);
      expect(isTidewireError(error)).toBe(true);
      expect(error).toBeInstanceOf(TidewireError);
      expect(isTidewireHttpError(new TidewireError('base'))).toBe(false);
      expect(isTidewireError(new Error('plain'))).toBe(false);
      expect(new TidewireHttpError({ code: 'header_error', message: 'm' }).name).toBe('TidewireHttpError');
    });
  });
});
