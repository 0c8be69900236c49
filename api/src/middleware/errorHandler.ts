import type { ErrorRequestHandler } from 'express';
import { GradingError } from '../errors';
import type { Logger } from '../logger';

function isPayloadError(err: Error): err is Error & { status: number; type: string } {
  return 'status' in err && typeof err.status === 'number' && 'type' in err && typeof err.type === 'string';
}

export function errorHandler(logger: Logger, exposeStack: boolean): ErrorRequestHandler {
  return (err: Error, req, res, _next) => {
    let statusCode = 500;
    let code = 'INTERNAL';
    if (err instanceof GradingError) {
      statusCode = err.statusCode;
      code = err.code;
    } else if (isPayloadError(err)) {
      // body-parser failures (too large, bad JSON)
      statusCode = err.status;
      code = err.type.toUpperCase().replace(/\./g, '_');
    }

    if (statusCode >= 500) {
      logger.error({
        module: 'middleware.errorHandler',
        error_message: err.message,
        stack_trace: err.stack,
        request_id: req.id,
        path: req.path,
        error_type: err.name,
      }, 'Unhandled error');
    } else {
      logger.warn({
        module: 'middleware.errorHandler',
        error_message: err.message,
        request_id: req.id,
        path: req.path,
        error_type: err.name,
        status_code: statusCode,
      }, 'Request rejected');
    }

    res.status(statusCode).json({
      error: {
        message: statusCode >= 500 ? 'Internal server error' : err.message,
        type: err.name,
        code,
        ...(exposeStack && { stack: err.stack }),
      },
    });
  };
}
