import { Injectable, Logger } from '@nestjs/common';
import OpenAI from 'openai';
import appConfig from '../../config/app.config';
import { CompletionRequest } from './llm.types';

/**
 * Chat-completion client for any OpenAI-compatible provider
 * (Together AI by default). Returns the text content of the first choice.
 */
@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  private readonly client: OpenAI;
  private readonly model: string;

  constructor() {
    const cfg = appConfig().llm;
    this.model = cfg.model;
    this.client = new OpenAI({
      apiKey: cfg.apiKey,
      baseURL: cfg.baseUrl,
      timeout: cfg.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages,
    });

    // an empty string is a valid answer; only a missing message is an error
    const content = response.choices[0]?.message?.content;
    if (content === null || content === undefined) {
      throw new Error(`No content in ${this.model} response`);
    }
    this.logger.debug(`${this.model} responded with ${content.length} chars`);
    return content;
  }
}
