// Pure HTTP utility functions
// All functions are pure - no side effects

export type ScalarValue = string | number | boolean;

/**
 * Value accepted for a query parameter, form field or header.
 * Arrays produce one entry per element, undefined drops the key.
 */
export type ParamValue = ScalarValue | readonly ScalarValue[] | undefined;

export type ParamRecord = Record<string, ParamValue>;

export const GZIP_HEADER_SIZE = 10;

/**
 * Sanitize URL for logging (redact sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);

    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    if (urlObj.password) {
      urlObj.password = '***';
    }

    return urlObj.toString();
  } catch {
    return url;
  }
};

/**
 * Normalize a parameter value to its string list
 */
export const toStrings = (value: ParamValue): string[] => {
  if (value === undefined) {
    return [];
  }
  if (Array.isArray(value)) {
    return value.map((item: ScalarValue) => String(item));
  }
  return [String(value)];
};

/**
 * Canonical MIME header form: "content-type" becomes "Content-Type".
 * Keys containing characters outside the token set are returned unchanged.
 */
export const canonicalHeaderKey = (key: string): string => {
  if (!/^[A-Za-z0-9!#$%&'*+\-.^_`|~]+$/.test(key)) {
    return key;
  }
  return key
    .toLowerCase()
    .split('-')
    .map((part) => (part.length > 0 ? part.charAt(0).toUpperCase() + part.slice(1) : part))
    .join('-');
};

/**
 * application/x-www-form-urlencoded with keys sorted
 */
export const encodeForm = (form: ParamRecord): string => {
  const params = new URLSearchParams();
  for (const key of Object.keys(form).sort()) {
    for (const value of toStrings(form[key])) {
      params.append(key, value);
    }
  }
  return params.toString();
};

export const encodeBasicAuth = (username: string, password: string): string =>
  Buffer.from(`${username}:${password}`, 'utf8').toString('base64');

/**
 * Escape quotes and backslashes for a quoted header parameter
 */
export const escapeQuotes = (value: string): string => value.replace(/[\\"]/g, (char) => `\\${char}`);

export const isGzipEncoding = (contentEncoding: string | undefined): boolean =>
  contentEncoding !== undefined && contentEncoding.trim().toLowerCase() === 'gzip';

/**
 * Gzip member header: ID1 ID2 and the deflate compression method
 */
export const hasGzipMagic = (header: Uint8Array): boolean =>
  header.length >= GZIP_HEADER_SIZE && header[0] === 0x1f && header[1] === 0x8b && header[2] === 0x08;

/**
 * Whether a response can carry a body at all
 */
export const responseMayHaveBody = (
  method: string,
  status: number,
  contentLength: string | undefined
): boolean => {
  if (method.toUpperCase() === 'HEAD') {
    return false;
  }
  if ((status >= 100 && status < 200) || status === 204 || status === 304) {
    return false;
  }
  return contentLength === undefined || contentLength.trim() !== '0';
};

/**
 * Plain text heuristic used when no signature matched. Empty input counts as text.
 */
export const looksLikeText = (bytes: Uint8Array): boolean => {
  for (const byte of bytes) {
    const control = byte < 0x20 && byte !== 0x09 && byte !== 0x0a && byte !== 0x0c && byte !== 0x0d && byte !== 0x1b;
    if (control || byte === 0x7f) {
      return false;
    }
  }
  return true;
};

export const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';
export const BINARY_CONTENT_TYPE = 'application/octet-stream';
