import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';

export const API_ERROR_MESSAGES: Record<string, string> = {
  CHAT_LOG_QUERY_FAILED: 'Could not read chat logs.',
  CHAT_LOG_CLEAR_FAILED: 'Could not clear chat logs.',
  INTERNAL_SERVER_ERROR: 'Unexpected error',
};

/**
 * Shapes every HTTP error as `{ error, message }`. Exceptions thrown with a
 * bare code string (e.g. `new BadRequestException('SOME_CODE')`) are looked up
 * in API_ERROR_MESSAGES.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (!(exception instanceof HttpException)) {
      this.logger.error(
        `Unhandled exception: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
      response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
        error: 'INTERNAL_SERVER_ERROR',
        message: API_ERROR_MESSAGES.INTERNAL_SERVER_ERROR,
      });
      return;
    }

    const status = exception.getStatus();
    const payload = exception.getResponse();

    if (typeof payload === 'string') {
      response.status(status).json({
        error: payload,
        message: API_ERROR_MESSAGES[payload] ?? payload,
      });
      return;
    }

    const messageValue =
      typeof payload === 'object' && payload !== null && 'message' in payload
        ? payload.message
        : undefined;

    if (typeof messageValue === 'string') {
      response.status(status).json({
        error: messageValue,
        message: API_ERROR_MESSAGES[messageValue] ?? messageValue,
      });
      return;
    }

    response.status(status).json({
      error: 'UNKNOWN_ERROR',
      message: 'Unexpected error',
    });
  }
}
