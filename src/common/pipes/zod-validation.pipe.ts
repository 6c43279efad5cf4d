// 요청 검증: zod 실패를 InvalidInputError(422) 로, 실패한 필드 경로와 함께

import type { ArgumentMetadata, PipeTransform } from '@nestjs/common';
import { Injectable } from '@nestjs/common';
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { InvalidInputError } from '../errors/engine-errors.js';

export interface ValidationIssue {
  /** 'activeSelf.revealedMoves[0].type' 형식. 최상위 값이면 '(root)' */
  path: string;
  message: string;
}

export function formatIssuePath(path: ZodIssue['path']): string {
  if (path.length === 0) return '(root)';
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') return `${acc}[${segment}]`;
    return acc === '' ? segment : `${acc}.${segment}`;
  }, '');
}

@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(private readonly schema: ZodType<T, ZodTypeDef, unknown>) {}

  transform(value: unknown, metadata: ArgumentMetadata): T {
    const result = this.schema.safeParse(value);
    if (result.success) return result.data;

    const issues = result.error.issues.map(
      (issue): ValidationIssue => ({
        path: formatIssuePath(issue.path),
        message: issue.message,
      }),
    );
    const [first] = issues;
    throw new InvalidInputError(`Invalid ${metadata.type} at ${first.path}: ${first.message}`, {
      source: metadata.type,
      issues,
    });
  }
}
