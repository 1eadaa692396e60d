import { errorMessage } from '@common/utils/error-handler';
import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';

/**
 * Plain-text error responses for the scrape surface.
 *
 * HTTP exceptions (unknown routes included) keep their status with an empty body.
 * Anything else is a 500 with `Error: <message>`.
 */
@Catch()
export class ScrapeExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ScrapeExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      response.status(exception.getStatus()).end();
      return;
    }

    const message = errorMessage(exception);
    const stack = exception instanceof Error ? exception.stack : undefined;
    this.logger.error(`Unhandled error while serving request: ${message}`, stack);
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).type('text/plain').send(`Error: ${message}`);
  }
}
