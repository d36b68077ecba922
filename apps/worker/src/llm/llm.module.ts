import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import { StructuredLlmService } from './structured-llm.service';
import { ChatCompletionsApi, OPENAI_CHAT_COMPLETIONS } from './llm.types';

/**
 * LlmModule: the OpenAI client and the structured-output wrapper.
 *
 * The client is built once from OPENAI_API_KEY; boot fails without it.
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: OPENAI_CHAT_COMPLETIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ChatCompletionsApi => {
        const apiKey = configService.get<string>('OPENAI_API_KEY');

        if (!apiKey) {
          throw new Error('OPENAI_API_KEY is not defined. Check your .env file.');
        }

        return new OpenAI({ apiKey, maxRetries: 0 }).chat.completions;
      },
    },
    StructuredLlmService,
  ],
  exports: [StructuredLlmService],
})
export class LlmModule {}
