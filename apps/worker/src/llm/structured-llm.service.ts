import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import { UpstreamError } from '@hairline/queue';
import {
  ChatCompletionsApi,
  DEFAULT_LLM_MAX_TOKENS,
  DEFAULT_LLM_MODEL,
  OPENAI_CHAT_COMPLETIONS,
  StructuredRequest,
  TextRequest,
} from './llm.types';

/**
 * StructuredLlmService: the worker's only door to the hosted model.
 *
 * Structured mode binds the zod schema as the single function tool and
 * forces the model to call it, then validates the arguments against the
 * same schema. Anything short of a valid call is an UpstreamError, which
 * the job runner retries within its attempt budget. Nothing is retried or
 * cached here.
 */
@Injectable()
export class StructuredLlmService {
  private readonly logger = new Logger(StructuredLlmService.name);
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(
    @Inject(OPENAI_CHAT_COMPLETIONS)
    private readonly completions: ChatCompletionsApi,
    configService: ConfigService,
  ) {
    this.model = configService.get<string>('LLM_MODEL', DEFAULT_LLM_MODEL);
    this.maxTokens = Number(
      configService.get<number>('LLM_MAX_TOKENS', DEFAULT_LLM_MAX_TOKENS),
    );
  }

  async generateStructured<T>(request: StructuredRequest<T>): Promise<T> {
    const { schema, toolName } = request;
    const { $schema: _dialect, ...parameters } = z.toJSONSchema(schema);

    const content: ChatCompletionContentPart[] = (request.images ?? []).map(
      (image): ChatCompletionContentPart => ({
        type: 'image_url',
        image_url: {
          url: `data:${image.mediaType};base64,${image.data.toString('base64')}`,
        },
      }),
    );
    content.push({ type: 'text', text: request.userText });

    const completion = await this.send({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content },
      ],
      tools: [
        {
          type: 'function',
          function: {
            name: toolName,
            description:
              request.toolDescription ?? `Record the ${toolName} result`,
            parameters,
          },
        },
      ],
      tool_choice: { type: 'function', function: { name: toolName } },
    });

    const toolCall = completion.choices[0]?.message.tool_calls
      ?.filter((call) => call.type === 'function')
      .find((call) => call.function.name === toolName);

    if (!toolCall) {
      throw new UpstreamError(`Model response contained no ${toolName} call`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(toolCall.function.arguments);
    } catch (error) {
      throw new UpstreamError(`${toolName} arguments are not valid JSON`, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new UpstreamError(
        `${toolName} output failed validation: ${z.prettifyError(parsed.error)}`,
      );
    }

    this.logger.debug(`${toolName} returned a valid result`);
    return parsed.data;
  }

  /** Free-text completion over a conversation; used by counseling only. */
  async generateText(request: TextRequest): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: request.systemPrompt },
      ...request.messages.map(
        (turn): ChatCompletionMessageParam =>
          turn.role === 'user'
            ? { role: 'user', content: turn.content }
            : { role: 'assistant', content: turn.content },
      ),
    ];

    const completion = await this.send({
      model: this.model,
      max_tokens: this.maxTokens,
      messages,
    });

    const text = completion.choices[0]?.message.content?.trim();
    if (!text) {
      throw new UpstreamError('Model returned an empty reply');
    }

    return text;
  }

  private async send(
    body: ChatCompletionCreateParamsNonStreaming,
  ): Promise<ChatCompletion> {
    try {
      return await this.completions.create(body);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`LLM request failed: ${cause.message}`);
      throw new UpstreamError(`LLM request failed: ${cause.message}`, {
        cause,
      });
    }
  }
}
