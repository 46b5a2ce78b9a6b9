import { Injectable } from '@nestjs/common';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { EmptyInputRejectedError } from './errors/quiz.errors';
import {
  GENERATION_MAX_TOKENS,
  GENERATION_TEMPERATURE,
  GENERATION_TOP_P,
  QUESTIONS_PER_QUIZ,
} from './quiz.constants';
import type { QuizDifficulty } from './types/quiz-question.interface';

export interface QuizGenerationRequest {
  messages: ChatCompletionMessageParam[];
  temperature: number;
  top_p: number;
  max_tokens: number;
}

const SCHEMA_EXAMPLE = `{
  "mcqs": [
    {
      "mcq": "Question text here",
      "options": {
        "a": "First option",
        "b": "Second option",
        "c": "Third option",
        "d": "Fourth option"
      },
      "correct": "a"
    }
  ]
}`;

@Injectable()
export class PromptBuilder {
  /**
   * Builds the chat completion request for a quiz over `textContent`.
   *
   * The text and the difficulty label are embedded verbatim.
   * @throws EmptyInputRejectedError when the text is blank.
   */
  build(
    textContent: string,
    difficulty: QuizDifficulty,
  ): QuizGenerationRequest {
    if (!textContent.trim()) {
      throw new EmptyInputRejectedError();
    }

    const prompt = `
Given the following text, create a quiz with exactly ${QUESTIONS_PER_QUIZ} multiple choice questions.

Text: ${textContent}

Difficulty level: ${difficulty}

Please format your response as a JSON object with the following structure:
${SCHEMA_EXAMPLE}

Requirements:
1. Generate exactly ${QUESTIONS_PER_QUIZ} questions
2. Each question must have exactly 4 options (a, b, c, d)
3. The 'correct' field must contain the letter of the correct answer (a, b, c, or d)
4. Questions should be relevant to the provided text
5. Maintain the specified difficulty level: ${difficulty}

Return ONLY the JSON object, no additional text or explanations.
`.trim();

    return {
      messages: [{ role: 'user', content: prompt }],
      temperature: GENERATION_TEMPERATURE,
      top_p: GENERATION_TOP_P,
      max_tokens: GENERATION_MAX_TOKENS,
    };
  }
}
