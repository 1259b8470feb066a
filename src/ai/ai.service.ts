import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { APICallError, generateText } from 'ai';
import type { LanguageModel } from 'ai';
import { UpstreamError } from '../common/errors/screening.errors';
import { AppConfig } from '../config/configuration';
import { LANGUAGE_MODEL } from './ai.constants';
import { SCREENING_SYSTEM_PROMPT } from './prompts/screening.prompt';

@Injectable()
export class AIService {
  private readonly logger = new Logger(AIService.name);
  private readonly temperature: number;
  private readonly maxOutputTokens: number;
  private readonly timeoutMs: number;

  constructor(
    @Inject(LANGUAGE_MODEL) private readonly model: LanguageModel,
    private readonly configService: ConfigService,
  ) {
    const config = this.configService.get<AppConfig>('app');

    this.temperature = config?.ai.temperature ?? 0.2;
    this.maxOutputTokens = config?.ai.maxOutputTokens ?? 2000;
    this.timeoutMs = config?.ai.timeoutMs ?? 30000;
  }

  /**
   * Sends one prompt to the model and returns its raw text reply.
   *
   * Single attempt, bounded by the configured timeout. Every failure is
   * reported as {@link UpstreamError}; retrying is up to the caller.
   */
  async complete(prompt: string): Promise<string> {
    const abortSignal = AbortSignal.timeout(this.timeoutMs);
    const startedAt = Date.now();

    try {
      const result = await generateText({
        model: this.model,
        system: SCREENING_SYSTEM_PROMPT,
        prompt,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        maxRetries: 0,
        abortSignal,
      });

      this.logger.log(
        `Model replied in ${Date.now() - startedAt}ms (${result.text.length} characters, finish reason: ${result.finishReason})`,
      );
      return result.text;
    } catch (error: unknown) {
      throw this.toUpstreamError(error, abortSignal.aborted);
    }
  }

  private toUpstreamError(error: unknown, timedOut: boolean): UpstreamError {
    if (timedOut) {
      this.logger.error(`AI service timed out after ${this.timeoutMs}ms`);
      return new UpstreamError(
        `AI service did not respond within ${this.timeoutMs}ms`,
        HttpStatus.GATEWAY_TIMEOUT,
      );
    }

    if (APICallError.isInstance(error)) {
      const status = error.statusCode ?? 'unknown';
      this.logger.error(`AI service responded with status ${status}`, {
        url: error.url,
        responseBody: error.responseBody?.substring(0, 500),
      });
      return new UpstreamError(`AI service responded with status ${status}`);
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(
      `AI service call failed: ${message}`,
      error instanceof Error ? error.stack : undefined,
    );
    return new UpstreamError(`AI service call failed: ${message}`);
  }
}
