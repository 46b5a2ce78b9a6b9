import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNotEmpty,
  IsObject,
  IsString,
  ValidateNested,
} from 'class-validator';
import { OPTION_KEYS, type OptionKey } from '../types/quiz-question.interface';

const trimString = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

// Shape of the model reply: { "mcqs": [{ "mcq", "options": {a..d}, "correct" }] }

export class McqOptionsDto {
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  a!: string;

  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  b!: string;

  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  c!: string;

  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  d!: string;
}

export class McqItemDto {
  @Transform(trimString)
  @IsString()
  @IsNotEmpty()
  mcq!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => McqOptionsDto)
  options!: McqOptionsDto;

  @IsIn(OPTION_KEYS)
  correct!: OptionKey;
}

export class McqPayloadDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => McqItemDto)
  mcqs!: McqItemDto[];
}
