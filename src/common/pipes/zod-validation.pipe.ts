import type { PipeTransform } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/game-errors.js';

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}

/** @Body(new ZodValidationPipe(Schema)): 기본값이 채워진 파싱 결과를 넘긴다 */
@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown): T {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new InvalidInputError('Validation failed', {
        issues: formatZodIssues(result.error),
      });
    }
    return result.data;
  }
}
