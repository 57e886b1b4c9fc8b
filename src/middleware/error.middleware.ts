import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import Database from 'better-sqlite3';
import { CustomError, ValidationError } from '../utils/errors';

const isMalformedBody = (err: Error): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

export const errorHandler: ErrorRequestHandler = (
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void => {
  if (err instanceof ValidationError) {
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        status: err.statusCode,
        issues: err.issues,
      },
    });
    return;
  }

  if (err instanceof CustomError) {
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        status: err.statusCode,
      },
    });
    return;
  }

  if (isMalformedBody(err)) {
    res.status(400).json({
      error: {
        message: 'Malformed JSON body',
        status: 400,
      },
    });
    return;
  }

  console.error('[http] unhandled error:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
  });

  if (err instanceof Database.SqliteError) {
    res.status(400).json({
      error: {
        message: 'Database operation failed',
        code: err.code,
        status: 400,
      },
    });
    return;
  }

  res.status(500).json({
    error: {
      message: 'Internal server error',
      status: 500,
    },
  });
};
