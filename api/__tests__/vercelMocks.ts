// In-process VercelRequest / VercelResponse pair for handler tests.

import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import type { VercelRequest, VercelRequestQuery, VercelResponse } from '@vercel/node';

export interface CapturedResponse {
  statusCode: number;
  body: unknown;
  headers: () => Record<string, unknown>;
}

export function createRequest(
  method: string,
  options: { body?: unknown; query?: VercelRequestQuery } = {}
): VercelRequest {
  const req = Object.assign(new IncomingMessage(new Socket()), {
    query: options.query ?? {},
    cookies: {},
    body: options.body
  });
  req.method = method;
  return req;
}

export function createResponse(req: VercelRequest): { res: VercelResponse; captured: CapturedResponse } {
  let statusCode = 200;
  let body: unknown;

  const base: ServerResponse = new ServerResponse(req);
  const res: VercelResponse = Object.assign(base, {
    status: (code: number) => {
      statusCode = code;
      return res;
    },
    json: (payload: unknown) => {
      body = payload;
      return res;
    },
    send: (payload: unknown) => {
      body = payload;
      return res;
    },
    redirect: () => res
  });

  const captured: CapturedResponse = {
    get statusCode() {
      return statusCode;
    },
    get body() {
      return body;
    },
    headers: () => ({ ...base.getHeaders() })
  };

  return { res, captured };
}
