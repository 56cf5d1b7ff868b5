import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { SimilarityError, ValidationError } from '../../errors/similarity.errors';

/**
 * Maps core errors to HTTP: bad input is 400, a failing store is 503.
 */
@Catch(SimilarityError)
export class SimilarityExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(SimilarityExceptionFilter.name);

  catch(exception: SimilarityError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof ValidationError ? HttpStatus.BAD_REQUEST : HttpStatus.SERVICE_UNAVAILABLE;

    if (status === HttpStatus.SERVICE_UNAVAILABLE) {
      this.logger.warn(`${request.method} ${request.url} → ${status}: ${exception.message}`);
    }

    response.status(status).json({
      statusCode: status,
      error: exception.name,
      message: exception.message,
      timestamp: new Date().toISOString(),
      path: request.url,
    });
  }
}
