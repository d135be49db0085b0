// Request options: each one configures a request under construction and
// can also be registered on a client as a before-request hook.

import { ok } from 'neverthrow';

import type { ParamRecord, ParamValue } from './core/http-utils.js';
import type { FormFields, MultipartFiles } from './multipart.js';
import type { RequestBody } from './request.js';
import type { RetryOptions } from './retry.js';
import type { RequestOption } from './types.js';

export const withQuery =
  (params: ParamRecord): RequestOption =>
  (request) => {
    request.setQuery(params);
    return ok();
  };

export const withHeaders =
  (headers: Record<string, ParamValue>): RequestOption =>
  (request) => {
    request.setHeaders(headers);
    return ok();
  };

export const withContentType =
  (contentType: string): RequestOption =>
  (request) => {
    request.setContentType(contentType);
    return ok();
  };

export const withUserAgent =
  (userAgent: string): RequestOption =>
  (request) => {
    request.setUserAgent(userAgent);
    return ok();
  };

export const withBearerToken =
  (token: string): RequestOption =>
  (request) => {
    request.setBearerToken(token);
    return ok();
  };

export const withBasicAuth =
  (username: string, password: string): RequestOption =>
  (request) => {
    request.setBasicAuth(username, password);
    return ok();
  };

export const withBody =
  (body: RequestBody | string | undefined): RequestOption =>
  (request) => {
    request.setBody(body);
    return ok();
  };

export const withContent =
  (content: Uint8Array): RequestOption =>
  (request) => {
    request.setContent(content);
    return ok();
  };

export const withText =
  (text: string): RequestOption =>
  (request) => {
    request.setText(text);
    return ok();
  };

export const withForm =
  (form: ParamRecord): RequestOption =>
  (request) => {
    request.setForm(form);
    return ok();
  };

export const withJson =
  (data: unknown): RequestOption =>
  (request) =>
    request.setJson(data);

export const withFiles =
  (files: MultipartFiles, form?: FormFields): RequestOption =>
  (request) => {
    request.setFiles(files, form);
    return ok();
  };

export const withSignal =
  (signal: AbortSignal): RequestOption =>
  (request) => {
    request.setSignal(signal);
    return ok();
  };

export const withRetry =
  (options?: RetryOptions): RequestOption =>
  (request) =>
    request.enableRetry(options);

export const withClientTrace = (): RequestOption => (request) => {
  request.enableClientTrace();
  return ok();
};
