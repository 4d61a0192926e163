/**
 * Outgoing request builder.
 *
 * @module
 */

import { JSON_CONTENT_TYPE } from '../constants.js';
import type { HttpMethod } from '../types/public/http.js';
import { createSerializationError } from './errors.js';
import { Fields, type FieldValue } from './fields.js';

const encoder = new TextEncoder();

/**
 * An outgoing HTTP request.
 *
 * Requests are immutable values: every `with*` step returns a new request and
 * leaves the one it was called on untouched, so intermediate builder states
 * can be kept and reused safely.
 *
 * @example
 * ```typescript
 * const request = new HttpRequest('POST', 'https://api.example.com/items')
 *   .withHeader('Accept', 'application/json')
 *   .withJson({ name: 'test' });
 *
 * const response = await client.send(request);
 * ```
 */
export class HttpRequest {
  readonly method: HttpMethod;
  private readonly _url: URL;
  private _headers: Fields;
  private _body: Uint8Array | undefined;

  /**
   * @param url - Absolute URL
   * @throws {TypeError} When `url` is a string that does not parse
   */
  constructor(method: HttpMethod, url: URL | string) {
    this.method = method;
    this._url = new URL(url);
    this._headers = new Fields();
    this._body = undefined;
  }

  /** Copy of the request URL */
  get url(): URL {
    return new URL(this._url);
  }

  /** Mutable copy of the request headers */
  get headers(): Fields {
    return this._headers.clone();
  }

  /** Copy of the request body, if any */
  get body(): Uint8Array | undefined {
    return this._body?.slice();
  }

  /**
   * Replaces the header set wholesale. A body keeps its `Content-Length`.
   */
  withHeaders(headers: Fields): HttpRequest {
    return this.derive(headers.clone(), this._body);
  }

  /**
   * Appends a single header
   * @throws {TidewireHttpError} `header_error` when the name or value is rejected
   */
  withHeader(name: string, value: FieldValue): HttpRequest {
    const headers = this._headers.clone();
    headers.append(name, value);
    return this.derive(headers, this._body);
  }

  /**
   * Sets the body and a matching `Content-Length` header.
   * Strings are encoded as UTF-8.
   */
  withBody(body: Uint8Array | string): HttpRequest {
    const bytes = typeof body === 'string' ? encoder.encode(body) : Uint8Array.from(body);
    return this.derive(this._headers.clone(), bytes);
  }

  /**
   * Serializes `value` as the JSON body and sets
   * `Content-Type: application/json; charset=UTF-8`.
   * @throws {TidewireHttpError} `serialization_error` when the value cannot be encoded
   */
  withJson(value: unknown): HttpRequest {
    let json: string | undefined;
    try {
      json = JSON.stringify(value);
    } catch (error) {
      throw createSerializationError(error);
    }
    if (json === undefined) {
      throw createSerializationError(new TypeError(`Cannot encode ${typeof value} as JSON`));
    }

    const headers = this._headers.clone();
    headers.set('Content-Type', JSON_CONTENT_TYPE);
    return this.derive(headers, this._body).withBody(json);
  }

  /**
   * Builds the next request value. With a body present, `Content-Length`
   * always holds exactly one value: the body's byte length.
   */
  private derive(headers: Fields, body: Uint8Array | undefined): HttpRequest {
    if (body !== undefined) {
      headers.set('Content-Length', String(body.byteLength));
    }
    const next = new HttpRequest(this.method, this._url);
    next._headers = headers;
    next._body = body;
    return next;
  }
}
