/**
 * Minimal Express request/response stand-ins for endpoint tests.
 */

import type { Request, Response } from 'express';

interface MockResponse {
  status(code: number): MockResponse;
  json(body: unknown): MockResponse;
  set(field: string, value: string): MockResponse;
  on(event: string, listener: () => void): MockResponse;
}

export interface ResponseRecorder {
  res: Response;
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
}

export function mockRequest(init: {
  method?: string;
  path?: string;
  url?: string;
  body?: unknown;
}): Request {
  const req = {
    method: 'POST',
    ...init,
    path: init.path ?? init.url ?? '/',
    url: init.url ?? init.path ?? '/',
    get: () => undefined,
  };
  return req as unknown as Request;
}

export function mockResponse(): ResponseRecorder {
  const recorder: Omit<ResponseRecorder, 'res'> = {
    statusCode: 200,
    body: undefined,
    headers: {},
  };

  const res: MockResponse = {
    status(code) {
      recorder.statusCode = code;
      return res;
    },
    json(body) {
      recorder.body = body;
      return res;
    },
    set(field, value) {
      recorder.headers[field] = value;
      return res;
    },
    on() {
      return res;
    },
  };

  return Object.assign(recorder, { res: res as unknown as Response });
}
