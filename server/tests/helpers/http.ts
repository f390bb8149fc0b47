import express, { Request, RequestHandler, Response } from 'express';
import { errorHandler, notFoundHandler } from '../../src/middleware';

export interface FakeRequest {
  method: string;
  url: string;
  body?: unknown;
  query?: Record<string, string>;
}

export interface DispatchResult {
  status: number;
  body: unknown;
}

export function createRequest(init: FakeRequest): Request {
  const req: Request = Object.create(express.request);
  req.method = init.method;
  req.url = init.url;
  req.body = init.body;
  req.query = init.query ?? {};
  return req;
}

/**
 * Response double whose json/end calls are recorded; status() is Express's own
 */
export function createResponse(onSend: (body: unknown) => void = () => undefined) {
  const res: Response = Object.create(express.response);
  res.statusCode = 200;

  const json = jest.fn((body: unknown) => {
    onSend(body);
    return res;
  });
  const end = jest.fn(() => {
    onSend(undefined);
    return res;
  });
  res.json = json;
  res.end = end;

  return { res, json, end };
}

/**
 * Run a request through a router, falling through to the app's 404 and error
 * handlers the way the mounted router would.
 */
export function dispatch(handler: RequestHandler, init: FakeRequest): Promise<DispatchResult> {
  return new Promise((resolve) => {
    const req = createRequest(init);
    const { res } = createResponse((body) => resolve({ status: res.statusCode, body }));

    handler(req, res, (error?: unknown) => {
      if (error) {
        errorHandler(error, req, res, () => undefined);
      } else {
        notFoundHandler(req, res);
      }
    });
  });
}
