import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';
import { isProductionEnvironment } from '../config';

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  functions.logger.error('Unhandled error:', err);

  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    return next(err);
  }

  // express.json() marks malformed bodies with a 4xx status
  const status = 'status' in err ? err.status : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    res.status(status).json({
      code: 'invalid_request',
      message: err.message,
    });
    return;
  }

  if (isProductionEnvironment()) {
    // In production, don't leak stack traces
    res.status(500).json({
      code: 'server_error',
      message: 'An unexpected error occurred',
    });
  } else {
    res.status(500).json({
      code: 'server_error',
      message: err.message,
      stack: err.stack,
    });
  }
}
