import { Module } from '@nestjs/common';
import { QuizCompletionClient } from './completion.client';
import { FallbackProvider } from './fallback.provider';
import { PromptBuilder } from './prompt.builder';
import { QuizController } from './quiz.controller';
import { QuizGeneratorService } from './quiz-generator.service';
import { QuizSessionStore } from './quiz-session.store';
import { QuizService } from './quiz.service';
import { ResponseValidator } from './response.validator';

@Module({
  controllers: [QuizController],
  providers: [
    PromptBuilder,
    ResponseValidator,
    FallbackProvider,
    QuizCompletionClient,
    QuizGeneratorService,
    QuizSessionStore,
    QuizService,
  ],
})
export class QuizModule {}
