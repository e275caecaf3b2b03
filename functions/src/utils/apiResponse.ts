import type { Request, RequestHandler, Response } from 'express';
import { InternalError, isResourceError, type ErrorKind, type ResourceError } from '../services/errors';
import { captureException } from './sentry';

export type ApiErrorBody = {
  kind: ErrorKind;
  message: string;
};

/** The only JSON shape the API ever responds with. */
export type ApiEnvelope<T> =
  | { status: 'success'; data: T; error: null }
  | { status: 'error'; data: null; error: ApiErrorBody };

export type SuccessKind = 'ok' | 'created';

export type Outcome<T> =
  | { ok: true; kind: SuccessKind; data: T }
  | { ok: false; error: ResourceError };

export type WireResponse<T> = {
  statusCode: number;
  body: ApiEnvelope<T>;
};

const FAILURE_STATUS: Record<ErrorKind, number> = {
  ValidationError: 400,
  ReferenceError: 400,
  NotFoundError: 404,
  RateLimitError: 429,
  StoreError: 500,
  InternalError: 500,
};

const SUCCESS_STATUS: Record<SuccessKind, number> = {
  ok: 200,
  created: 201,
};

export function ok<T>(data: T): Outcome<T> {
  return { ok: true, kind: 'ok', data };
}

export function created<T>(data: T): Outcome<T> {
  return { ok: true, kind: 'created', data };
}

export function failed(error: ResourceError): Outcome<never> {
  return { ok: false, error };
}

/**
 * Normalises anything thrown by a handler into a reportable error. Errors that
 * are not ResourceErrors are logged and reported, and their message is not
 * passed on to the client. StoreErrors are logged where the store raises them.
 */
export function toResourceError(error: unknown, context?: Record<string, unknown>): ResourceError {
  if (isResourceError(error)) {
    return error;
  }

  captureException(error, context);
  return new InternalError();
}

export function envelope<T>(outcome: Outcome<T>): WireResponse<T> {
  if (outcome.ok) {
    return {
      statusCode: SUCCESS_STATUS[outcome.kind],
      body: { status: 'success', data: outcome.data, error: null },
    };
  }

  return {
    statusCode: FAILURE_STATUS[outcome.error.kind],
    body: {
      status: 'error',
      data: null,
      error: { kind: outcome.error.kind, message: outcome.error.message },
    },
  };
}

export function sendEnvelope<T>(res: Response, outcome: Outcome<T>): void {
  const { statusCode, body } = envelope(outcome);
  res.status(statusCode).json(body);
}

/**
 * Adapts an Outcome-returning function to an Express handler. Route code only
 * produces Outcomes; this is the single place a resource response is written.
 */
export function envelopeHandler<T>(handle: (req: Request) => Promise<Outcome<T>>): RequestHandler {
  return async (req, res) => {
    let outcome: Outcome<T>;
    try {
      outcome = await handle(req);
    } catch (error) {
      outcome = failed(toResourceError(error, { method: req.method, path: req.originalUrl }));
    }
    sendEnvelope(res, outcome);
  };
}
