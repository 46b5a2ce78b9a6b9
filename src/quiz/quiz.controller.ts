import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  ParseUUIDPipe,
  Post,
  Put,
} from '@nestjs/common';
import { GenerateQuizDto } from './dto/generate-quiz.dto';
import { SelectAnswerDto } from './dto/select-answer.dto';
import { QuizService } from './quiz.service';
import type {
  QuizResponse,
  QuizResult,
  QuizView,
} from './types/quiz-question.interface';

@Controller('quiz')
export class QuizController {
  constructor(private readonly quizService: QuizService) {}

  @Post()
  async generateQuiz(
    @Body() generateQuizDto: GenerateQuizDto,
  ): Promise<QuizResponse> {
    return this.quizService.createQuiz(generateQuizDto);
  }

  @Put(':sessionId')
  async regenerateQuiz(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @Body() generateQuizDto: GenerateQuizDto,
  ): Promise<QuizResponse> {
    return this.quizService.regenerateQuiz(sessionId, generateQuizDto);
  }

  @Get(':sessionId')
  getQuiz(@Param('sessionId', ParseUUIDPipe) sessionId: string): QuizView {
    return this.quizService.getQuiz(sessionId);
  }

  @Put(':sessionId/answers/:index')
  selectAnswer(
    @Param('sessionId', ParseUUIDPipe) sessionId: string,
    @Param('index', ParseIntPipe) index: number,
    @Body() selectAnswerDto: SelectAnswerDto,
  ): QuizView {
    return this.quizService.selectAnswer(
      sessionId,
      index,
      selectAnswerDto.option,
    );
  }

  @Post(':sessionId/submit')
  @HttpCode(HttpStatus.OK)
  submitQuiz(@Param('sessionId', ParseUUIDPipe) sessionId: string): QuizResult {
    return this.quizService.submitQuiz(sessionId);
  }

  @Delete(':sessionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  discardQuiz(@Param('sessionId', ParseUUIDPipe) sessionId: string): void {
    this.quizService.discardQuiz(sessionId);
  }
}
