import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { TransportFailureError } from './errors/quiz.errors';
import type { QuizGenerationRequest } from './prompt.builder';
import { DEFAULT_LLM_BASE_URL, DEFAULT_LLM_MODEL } from './quiz.constants';

/**
 * Thin wrapper over an OpenAI-compatible chat completions endpoint (Groq by
 * default). Retries, timeouts and auth are left to the SDK.
 */
@Injectable()
export class QuizCompletionClient {
  private readonly logger = new Logger(QuizCompletionClient.name);
  private readonly client?: OpenAI;
  private readonly model: string;

  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>('GROQ_API_KEY');
    const baseURL =
      this.configService.get<string>('GROQ_BASE_URL') ?? DEFAULT_LLM_BASE_URL;
    this.model =
      this.configService.get<string>('GROQ_MODEL') ?? DEFAULT_LLM_MODEL;

    if (!apiKey) {
      this.logger.warn(
        'GROQ_API_KEY is missing. Every quiz will use the placeholder questions.',
      );
      return;
    }

    this.client = new OpenAI({ apiKey, baseURL });
    this.logger.log(
      `Quiz generation enabled with model "${this.model}" at ${baseURL}`,
    );
  }

  get isEnabled(): boolean {
    return !!this.client;
  }

  /** Sends the request and returns the raw text of the first choice. */
  async complete(request: QuizGenerationRequest): Promise<string> {
    if (!this.client) {
      throw new TransportFailureError('Completion client is not configured.');
    }

    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: request.messages,
      temperature: request.temperature,
      top_p: request.top_p,
      max_tokens: request.max_tokens,
      response_format: { type: 'json_object' },
      stream: false,
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new TransportFailureError('Completion response has no content.');
    }
    return content;
  }
}
