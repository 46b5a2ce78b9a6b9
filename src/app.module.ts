import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { QuizErrorFilter } from './quiz/errors/quiz-error.filter';
import { QuizModule } from './quiz/quiz.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), QuizModule],
  providers: [{ provide: APP_FILTER, useClass: QuizErrorFilter }],
})
export class AppModule {}
