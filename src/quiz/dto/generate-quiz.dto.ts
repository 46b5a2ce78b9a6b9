import { IsOptional, IsString, MaxLength } from 'class-validator';
import { DEFAULT_DIFFICULTY } from '../quiz.constants';
import type { QuizDifficulty } from '../types/quiz-question.interface';

export class GenerateQuizDto {
  // Blank text is rejected by the generator with a user-facing warning.
  @IsString()
  @MaxLength(50_000)
  text!: string;

  @IsOptional()
  @IsString()
  @MaxLength(32)
  difficulty: QuizDifficulty = DEFAULT_DIFFICULTY;
}
