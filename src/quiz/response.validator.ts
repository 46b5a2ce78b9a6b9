import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync, type ValidationError } from 'class-validator';
import { McqPayloadDto } from './dto/mcq-payload.dto';
import {
  OPTION_KEYS,
  type Question,
  type QuestionSet,
} from './types/quiz-question.interface';

export type ValidationFailureKind = 'MalformedJSON' | 'SchemaMismatch';

export interface ValidationFailure {
  kind: ValidationFailureKind;
  detail: string;
}

export type ValidationResult =
  | { ok: true; questions: QuestionSet }
  | { ok: false; failure: ValidationFailure };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

@Injectable()
export class ResponseValidator {
  /**
   * Parses a model reply into a question set. All-or-nothing: one bad item
   * rejects the whole batch. Never throws.
   */
  validate(rawResponseText: string): ValidationResult {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawResponseText);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return this.fail('MalformedJSON', message);
    }

    const document = isRecord(parsed) ? parsed : null;
    const mcqs: unknown = document?.mcqs;
    if (!document || !Array.isArray(mcqs)) {
      return this.fail(
        'SchemaMismatch',
        'expected an object with an "mcqs" array',
      );
    }
    if (mcqs.length === 0) {
      return this.fail('SchemaMismatch', '"mcqs" is empty');
    }

    const shapeProblem = this.findShapeProblem(mcqs);
    if (shapeProblem) {
      return this.fail('SchemaMismatch', shapeProblem);
    }

    const payload = plainToInstance(McqPayloadDto, document);
    const errors = validateSync(payload);
    if (errors.length > 0) {
      return this.fail('SchemaMismatch', this.describe(errors).join('; '));
    }

    const questions: Question[] = payload.mcqs.map((item) =>
      Object.freeze({
        text: item.mcq,
        options: Object.freeze({
          a: item.options.a,
          b: item.options.b,
          c: item.options.c,
          d: item.options.d,
        }),
        correctKey: item.correct,
      }),
    );

    return { ok: true, questions: Object.freeze(questions) };
  }

  // class-validator does not check for unknown keys per nested object, so
  // the exact a-d key set is checked here.
  private findShapeProblem(items: unknown[]): string | null {
    for (const [index, item] of items.entries()) {
      if (!isRecord(item)) {
        return `mcqs.${index} must be an object`;
      }
      const { options } = item;
      if (!isRecord(options)) {
        return `mcqs.${index}.options must be an object`;
      }
      const keys = Object.keys(options).sort();
      if (
        keys.length !== OPTION_KEYS.length ||
        !OPTION_KEYS.every((key, position) => keys[position] === key)
      ) {
        return `mcqs.${index}.options must have exactly the keys a, b, c, d (got ${
          keys.join(', ') || 'none'
        })`;
      }
    }
    return null;
  }

  private describe(errors: ValidationError[], parentPath = ''): string[] {
    return errors.flatMap((error) => {
      const path = parentPath
        ? `${parentPath}.${error.property}`
        : error.property;
      const own = Object.values(error.constraints ?? {}).map(
        (message) => `${path}: ${message}`,
      );
      return [...own, ...this.describe(error.children ?? [], path)];
    });
  }

  private fail(kind: ValidationFailureKind, detail: string): ValidationResult {
    return { ok: false, failure: { kind, detail } };
  }
}
