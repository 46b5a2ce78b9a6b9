import { Injectable } from '@nestjs/common';
import type {
  OptionKey,
  Question,
  QuestionSet,
} from './types/quiz-question.interface';

const PLACEHOLDER_CORRECT_KEYS: OptionKey[] = ['a', 'b', 'c'];

/** Placeholder questions used whenever generation or validation fails. */
@Injectable()
export class FallbackProvider {
  defaultQuestionSet(): QuestionSet {
    const questions: Question[] = PLACEHOLDER_CORRECT_KEYS.map(
      (correctKey, index) =>
        Object.freeze({
          text: `Sample Question ${index + 1}`,
          options: Object.freeze({
            a: 'Option A',
            b: 'Option B',
            c: 'Option C',
            d: 'Option D',
          }),
          correctKey,
        }),
    );
    return Object.freeze(questions);
  }
}
