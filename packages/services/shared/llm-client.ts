// ============================================
// LLM Client - OpenAI Chat Completions
// The only unbounded-latency call in a turn; it carries its own timeout
// ============================================

import { OpenAI, type ClientOptions } from 'openai';
import { GenerationError, describeError } from './errors';

export interface ChatPrompt {
   system: string;
   user: string;
}

export interface GenerationSettings {
   model: string;
   temperature: number;
   maxTokens: number;
   timeoutMs: number;
}

/** Opaque text generation: resolves with text or rejects with GenerationError */
export interface TextGenerator {
   readonly model: string;
   generate(prompt: ChatPrompt): Promise<string>;
}

export interface CompletionRequest extends GenerationSettings {
   prompt: ChatPrompt;
}

/** One chat completion round trip; returns the first choice's content */
export type CompletionFn = (
   request: CompletionRequest
) => Promise<string | null | undefined>;

/**
 * Adapt an OpenAI client to a CompletionFn.
 * The timeout is applied per request.
 */
export function createOpenAICompletion(client: OpenAI): CompletionFn {
   return async (request) => {
      const response = await client.chat.completions.create(
         {
            model: request.model,
            messages: [
               { role: 'system', content: request.prompt.system },
               { role: 'user', content: request.prompt.user },
            ],
            temperature: request.temperature,
            max_tokens: request.maxTokens,
         },
         { timeout: request.timeoutMs }
      );

      return response.choices[0]?.message?.content;
   };
}

export class OpenAITextGenerator implements TextGenerator {
   constructor(
      private readonly complete: CompletionFn,
      private readonly settings: GenerationSettings
   ) {}

   get model(): string {
      return this.settings.model;
   }

   async generate(prompt: ChatPrompt): Promise<string> {
      let content: string | null | undefined;

      try {
         content = await this.complete({ ...this.settings, prompt });
      } catch (error) {
         throw new GenerationError(
            `OpenAI request failed: ${describeError(error)}`,
            error
         );
      }

      const text = content?.trim() ?? '';
      if (text.length === 0) {
         throw new GenerationError('OpenAI returned an empty completion');
      }

      return text;
   }
}

/**
 * Production generator. Retries are disabled: a failed call ends the turn.
 * `clientOptions` may set baseURL or fetch; maxRetries cannot be overridden.
 */
export function createOpenAITextGenerator(
   apiKey: string,
   settings: GenerationSettings,
   clientOptions: Omit<ClientOptions, 'apiKey' | 'maxRetries'> = {}
): OpenAITextGenerator {
   const client = new OpenAI({ ...clientOptions, apiKey, maxRetries: 0 });
   return new OpenAITextGenerator(createOpenAICompletion(client), settings);
}
