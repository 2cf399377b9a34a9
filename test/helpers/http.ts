import express from "express";
import type { Request, Response } from "express";

export interface CapturedResponse {
  res: Response;
  sent: () => { status: number; body: unknown };
}

/**
 * Request stand-in built on Express's own prototype. Only plain fields are set.
 */
export function fakeRequest(fields: {
  method?: string;
  body?: unknown;
  query?: Record<string, string>;
  originalUrl?: string;
}): Request {
  const req: Request = Object.create(express.request);
  req.method = fields.method ?? "POST";
  req.body = fields.body;
  req.query = fields.query ?? {};
  req.originalUrl = fields.originalUrl ?? "/test";
  return req;
}

/**
 * Response stand-in that records the status code and JSON payload
 * instead of writing to a socket.
 */
export function fakeResponse(): CapturedResponse {
  const res: Response = Object.create(express.response);
  let body: unknown;

  res.statusCode = 200;
  res.json = (payload: unknown) => {
    body = payload;
    return res;
  };

  return {
    res,
    sent: () => ({ status: res.statusCode, body }),
  };
}
