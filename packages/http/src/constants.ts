// Outgoing bodies are written in chunks of this many bytes
export const BODY_CHUNK_SIZE = 4096;

// Content-Type set by HttpRequest.withJson
export const JSON_CONTENT_TYPE = 'application/json; charset=UTF-8';

// Read ceiling used when a response declares no usable Content-Length
export const UNBOUNDED_READ_CEILING = Number.MAX_SAFE_INTEGER;
