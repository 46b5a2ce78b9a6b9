import { IsIn } from 'class-validator';
import { OPTION_KEYS, type OptionKey } from '../types/quiz-question.interface';

export class SelectAnswerDto {
  @IsIn(OPTION_KEYS)
  option!: OptionKey;
}
