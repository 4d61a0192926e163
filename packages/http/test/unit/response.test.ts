import { z } from 'zod';

import { Fields, HttpResponse, TransportFailure, TidewireHttpError, readChunks } from '../../src';
import { MemoryInputStream, text } from '../utils/memory-transport';

const createResponse = (
  chunks: Array<string | Uint8Array>,
  headers: Array<[string, string]> = [],
  failure?: TransportFailure
) => {
  const stream = new MemoryInputStream(chunks, failure);
  const response = new HttpResponse({
    status: 200,
    headers: Fields.fromIncoming(headers),
    consume: () => stream,
  });
  return { response, stream };
};

describe('HttpResponse', () => {
  describe('bytes()', () => {
    it('should read exactly Content-Length bytes however the stream chunks them', async () => {
      const { response, stream } = createResponse(['ab', 'cde', 'f', 'ghij'], [['Content-Length', '10']]);

      const body = await response.bytes();

      expect(text(body)).toBe('abcdefghij');
      expect(stream.readSizes).toEqual([10, 8, 5, 4]);
    });

    it('should bound each read by the bytes still outstanding', async () => {
      const { response, stream } = createResponse(['abcdefgh'], [['Content-Length', '5']]);

      const body = await response.bytes();

      expect(text(body)).toBe('abcde');
      expect(stream.readSizes).toEqual([5]);
      expect(stream.cancelled).toBe(true);
    });

    it('should stop at closure when the stream is shorter than declared', async () => {
      const { response } = createResponse(['abc'], [['Content-Length', '10']]);

      expect(text(await response.bytes())).toBe('abc');
    });

    it('should concatenate every chunk until closure without Content-Length', async () => {
      const { response, stream } = createResponse(['A', 'BB', 'CCC']);

      expect(text(await response.bytes())).toBe('ABBCCC');
      expect(stream.readSizes).toHaveLength(4);
      expect(stream.cancelled).toBe(false);
    });

    it.each([['-1'], ['1.5'], ['ten'], ['']])('should ignore an unusable Content-Length of %p', async (value) => {
      const { response } = createResponse(['hello', ' world'], [['Content-Length', value]]);

      expect(text(await response.bytes())).toBe('hello world');
    });

    it('should not read at all for Content-Length 0', async () => {
      const { response, stream } = createResponse(['ignored'], [['Content-Length', '0']]);

      expect(await response.bytes()).toEqual(new Uint8Array(0));
      expect(stream.readSizes).toEqual([]);
    });

    it('should surface a failed read as transport_error', async () => {
      const failure = new TransportFailure({ type: 'connection_reset' });
      const { response } = createResponse(['partial'], [], failure);

      await expect(response.bytes()).rejects.toThrow(TidewireHttpError);
      const { response: again } = createResponse([], [], failure);
      try {
        await again.bytes();
      } catch (err) {
        const error = err as TidewireHttpError;
        expect(error.code).toBe('transport_error');
        expect(error.transportCode).toEqual({ type: 'connection_reset' });
      }
    });
  });

  describe('single use', () => {
    it('should throw when the body is read twice', async () => {
      const { response } = createResponse(['once']);

      await response.text();

      expect(response.bodyUsed).toBe(true);
      await expect(response.bytes()).rejects.toThrow('Response body has already been consumed');
      expect(() => response.inputStream()).toThrow(TypeError);
    });

    it('should ignore discard after the body was taken', async () => {
      const { response, stream } = createResponse(['data']);

      response.inputStream();
      await response.discard();

      expect(stream.cancelled).toBe(false);
    });
  });

  describe('text()', () => {
    it('should replace invalid UTF-8 sequences', async () => {
      const { response } = createResponse([new Uint8Array([0x68, 0x69, 0xff, 0x21])]);

      expect(await response.text()).toBe('hi\uFFFD!');
    });
  });

  describe('json()', () => {
    it('should parse the body as JSON', async () => {
      const { response } = createResponse(['{"data":', '[1,2]}']);

      expect(await response.json()).toEqual({ data: [1, 2] });
    });

    it('should validate the shape with a decoder', async () => {
      const schema = z.object({ id: z.string() });
      const { response } = createResponse(['{"id":"42","extra":true}']);

      const value = await response.json(schema);

      expect(value).toEqual({ id: '42' });
    });

    it('should throw serialization_error on malformed JSON', async () => {
      const { response } = createResponse(['{"broken"']);

      await expect(response.json()).rejects.toMatchObject({ code: 'serialization_error' });
    });

    it('should throw serialization_error on a shape mismatch', async () => {
      const schema = z.object({ id: z.string() });
      const { response } = createResponse(['{"id":1}']);

      await expect(response.json(schema)).rejects.toMatchObject({
        name: 'TidewireHttpError',
        code: 'serialization_error',
      });
    });

    it('should reject bodies that are not valid UTF-8', async () => {
      const { response } = createResponse([new Uint8Array([0x22, 0xff, 0x22])]);

      await expect(response.json()).rejects.toMatchObject({ code: 'serialization_error' });
    });
  });

  describe('inputStream()', () => {
    it('should hand over the raw stream for chunked consumption', async () => {
      const { response } = createResponse(['first', 'second']);
      const received: string[] = [];

      for await (const chunk of readChunks(response.inputStream(), 3)) {
        received.push(text(chunk));
      }

      expect(received).toEqual(['fir', 'st', 'sec', 'ond']);
    });
  });
});
