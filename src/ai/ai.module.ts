import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import type { LanguageModel } from 'ai';
import { AppConfig } from '../config/configuration';
import { LANGUAGE_MODEL } from './ai.constants';
import { AIService } from './ai.service';
import { ResponseValidator } from './validators/response.validator';

@Module({
  providers: [
    {
      provide: LANGUAGE_MODEL,
      useFactory: (configService: ConfigService): LanguageModel => {
        const config = configService.get<AppConfig>('app');
        const modelName = config?.ai.model || 'gemini-2.5-flash';

        new Logger(AIModule.name).log(`Using Google model ${modelName}`);
        const google = createGoogleGenerativeAI({ apiKey: config?.ai.apiKey });
        return google(modelName);
      },
      inject: [ConfigService],
    },
    AIService,
    ResponseValidator,
  ],
  exports: [AIService, ResponseValidator],
})
export class AIModule {}
