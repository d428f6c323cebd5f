// ═══════════════════════════════════════════════════════════════════════════════
// EXPRESS TEST DOUBLES — Minimal Request/Response Mocks and Router Dispatch
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, Router } from 'express';

import { errorHandler } from '../middleware/error-handler.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MOCKS
// ─────────────────────────────────────────────────────────────────────────────────

export interface MockRequestInit {
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  body?: unknown;
  requestId?: string;
}

export function createMockRequest(init: MockRequestInit = {}): Request {
  const url = init.url ?? '/test';
  const req = {
    method: init.method ?? 'GET',
    url,
    path: url,
    headers: init.headers ?? {},
    body: init.body,
    params: {},
    requestId: init.requestId,
  };
  return req as unknown as Request;
}

interface MockResponseShape {
  _status: number;
  _json: unknown;
  _headers: Record<string, string>;
  statusCode: number;
  status(code: number): MockResponseShape;
  json(data: unknown): MockResponseShape;
  setHeader(name: string, value: string): MockResponseShape;
}

export type MockResponse = Response & MockResponseShape;

/**
 * `onSend` fires when a body is written.
 */
export function createMockResponse(onSend?: () => void): MockResponse {
  const res: MockResponseShape = {
    _status: 200,
    _json: undefined,
    _headers: {},
    statusCode: 200,
    status(code) {
      this._status = code;
      this.statusCode = code;
      return this;
    },
    json(data) {
      this._json = data;
      onSend?.();
      return this;
    },
    setHeader(name, value) {
      this._headers[name] = value;
      return this;
    },
  };
  return res as unknown as MockResponse;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DISPATCH
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Run a request through `router` and the error handler, resolving with the
 * response once a body is written. Unmatched routes resolve with status 404.
 */
export function dispatch(router: Router, init: MockRequestInit): Promise<MockResponse> {
  return new Promise(resolve => {
    const req = createMockRequest(init);
    const res = createMockResponse(() => resolve(res));

    router(req, res, (error?: unknown) => {
      if (error) {
        errorHandler(error, req, res, () => undefined);
      } else {
        res.status(404).json({ error: 'No route matched' });
      }
    });
  });
}
