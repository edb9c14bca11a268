import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';
import { GameError } from '../errors/game-errors.js';

@Catch()
export class GameExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GameExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();

    if (exception instanceof GameError) {
      res.status(exception.httpStatus).json({
        code: exception.code,
        category: exception.category,
        message: exception.message,
        details: exception.details ?? null,
      });
      return;
    }

    // 컨트롤러에서 schema.parse() 실패
    if (exception instanceof ZodError) {
      res.status(422).json({
        code: 'INVALID_INPUT',
        category: 'VALIDATION',
        message: 'Validation failed',
        details: {
          issues: exception.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        },
      });
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      res.status(status).json({
        code: 'HTTP_ERROR',
        category: 'INTERNAL',
        message: typeof body === 'string' ? body : exception.message,
        details: typeof body === 'object' ? body : null,
      });
      return;
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      code: 'INTERNAL_ERROR',
      category: 'INTERNAL',
      message: 'Internal server error',
      details: null,
    });
  }
}
