import { DomainError } from '@dripline/domain-kernel/errors';
import type { ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { Env } from './env.js';

type ErrorStatus = 400 | 404 | 409 | 422;

function errorStatus(statusCode: number): ErrorStatus {
  switch (statusCode) {
    case 404:
      return 404;
    case 409:
      return 409;
    case 422:
      return 422;
    default:
      return 400;
  }
}

export function errorHandler(): ErrorHandler<Env> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const requestId = c.get('requestId');

    if (err instanceof DomainError) {
      return c.json({ ...err.toBody(), requestId }, errorStatus(err.statusCode));
    }

    if (err instanceof ZodError) {
      return c.json(
        {
          error: 'VALIDATION_ERROR',
          message: 'Invalid request',
          details: { issues: err.issues },
          requestId,
        },
        400,
      );
    }

    c.get('logger').error({ err, requestId }, 'Unhandled error');

    return c.json(
      {
        error: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId,
      },
      500,
    );
  };
}
