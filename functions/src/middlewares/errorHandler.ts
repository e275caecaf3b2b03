import type { NextFunction, Request, Response } from 'express';
import * as functions from 'firebase-functions';
import { InternalError, NotFoundError, ValidationError } from '../services/errors';
import { failed, sendEnvelope } from '../utils/apiResponse';
import { captureException } from '../utils/sentry';

type ClientRequestError = Error & {
  type?: unknown;
  status: number;
};

// express.json() marks its failures with a `type` such as "entity.parse.failed";
// the router marks undecodable path params with status 400 and no type
function isClientRequestError(err: unknown): err is ClientRequestError {
  return (
    err instanceof Error &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

function describeClientRequestError(err: ClientRequestError): string {
  switch (err.type) {
    case 'entity.parse.failed':
      return 'Request body is not valid JSON';
    case 'entity.too.large':
      return 'Request body is too large';
    case undefined:
      return err instanceof URIError ? 'Request path is not valid URL encoding' : 'Request is malformed';
    default:
      return 'Request body could not be read';
  }
}

/**
 * Answers requests no router matched.
 */
export function notFoundHandler(req: Request, res: Response) {
  sendEnvelope(res, failed(new NotFoundError(`Route not found: ${req.method} ${req.path}`)));
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    return next(err);
  }

  if (isClientRequestError(err)) {
    functions.logger.warn(`[errorHandler] Rejected ${req.method} ${req.originalUrl}: ${err.message}`);
    sendEnvelope(res, failed(new ValidationError(describeClientRequestError(err))));
    return;
  }

  captureException(err, { method: req.method, path: req.originalUrl });
  sendEnvelope(res, failed(new InternalError()));
}
