import OpenAI, {
  APIConnectionTimeoutError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
} from 'openai';
import type { ChatCompletion, ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import {
  describeError,
  ProviderAuthError,
  ProviderError,
  ProviderGenericError,
  ProviderRateLimitError,
  ProviderTimeoutError,
} from '../shared/errors/engine-errors';
import { logger } from '../shared/logger';

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export type LlmPurpose =
  | 'intro'
  | 'prerequisite_quiz_questions'
  | 'prerequisite_quiz_feedback'
  | 'recap'
  | 'probe'
  | 'probe_response'
  | 'explain'
  | 'explain_response'
  | 'micro_quiz_question'
  | 'micro_quiz_feedback'
  | 'test_builder'
  | 'grader'
  | 'wrap_up';

export interface InvokeOptions {
  purpose: LlmPurpose;
  temperature?: number;
  maxTokens?: number;
}

export type LlmProvider = 'mock' | 'openai' | 'azure_openai';

export interface InvokeResult {
  text: string;
  model: string;
  provider: LlmProvider;
}

export interface LlmTool {
  invoke(systemPrompt: string, history: ChatMessage[], options: InvokeOptions): Promise<InvokeResult>;
}

const DEFAULT_PHRASES = [
  'Let us look at this from a concrete angle.',
  'Good, that gives us something to build on.',
  'That is a reasonable start; one detail is worth tightening.',
  'Here is the key idea in plain terms.',
];

const FOLLOW_UPS = [
  'Can you describe it in your own words?',
  'Where have you seen this in practice?',
  'What would change if one assumption were different?',
  'Which part feels least certain to you?',
];

const DEFAULT_COMPLETION_TOKENS = 400;
const MIN_COMPLETION_TOKENS = 64;
const MAX_COMPLETION_TOKENS = 1200;
const MOCK_MODEL = 'deterministic-mock-v2';

const stableHash = (value: string): number => {
  let hash = 0;

  for (let index = 0; index < value.length; index += 1) {
    hash = (hash * 31 + value.charCodeAt(index)) >>> 0;
  }

  return hash;
};

const clampCompletionTokens = (requested?: number): number => {
  if (typeof requested !== 'number' || !Number.isFinite(requested)) {
    return DEFAULT_COMPLETION_TOKENS;
  }

  return Math.max(
    MIN_COMPLETION_TOKENS,
    Math.min(MAX_COMPLETION_TOKENS, Math.floor(requested)),
  );
};

const calculateRetryTokens = (baseMaxTokens: number): number => {
  return Math.max(
    baseMaxTokens,
    Math.min(
      MAX_COMPLETION_TOKENS,
      Math.max(baseMaxTokens + 120, Math.floor(baseMaxTokens * 1.5)),
    ),
  );
};

const listItems = (text: string): string[] => {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.startsWith('- '))
    .map((line) => line.slice(2).trim())
    .filter(Boolean);
};

const lastUserMessage = (history: ChatMessage[]): string => {
  for (let index = history.length - 1; index >= 0; index -= 1) {
    const message = history[index];
    if (message?.role === 'user') {
      return message.content;
    }
  }

  return '';
};

/**
 * Offline stand-in used when no provider key is configured. Output depends only
 * on the prompt, so a session replays identically.
 */
class DeterministicMockLlmTool implements LlmTool {
  public invoke(
    systemPrompt: string,
    history: ChatMessage[],
    options: InvokeOptions,
  ): Promise<InvokeResult> {
    return Promise.resolve({
      text: this.compose(systemPrompt, history, options.purpose),
      model: MOCK_MODEL,
      provider: 'mock',
    });
  }

  private compose(systemPrompt: string, history: ChatMessage[], purpose: LlmPurpose): string {
    const request = lastUserMessage(history);
    const items = listItems(request);
    const fingerprint = stableHash(`${systemPrompt}|${request}|${history.length}`);
    const phrase = DEFAULT_PHRASES[fingerprint % DEFAULT_PHRASES.length] ?? DEFAULT_PHRASES[0];
    const followUp = FOLLOW_UPS[fingerprint % FOLLOW_UPS.length] ?? FOLLOW_UPS[0];

    switch (purpose) {
      case 'recap': {
        const learnerTurns = history.filter((message) => message.role === 'user').length;
        const recap = `${phrase} Tell me if anything in this recap is unclear.`;
        return learnerTurns >= 2 ? `${recap}\n<control>{"prereq_complete": true}</control>` : recap;
      }
      case 'prerequisite_quiz_questions':
        return JSON.stringify({
          questions: items.map((item) => ({
            prompt: `What do you remember about: ${item}?`,
            expectedAnswer: item,
          })),
        });
      case 'micro_quiz_question': {
        const focus = items[0] ?? 'this objective';
        return JSON.stringify({
          prompt: `In one or two sentences, how would you apply ${focus}?`,
          expectedAnswer: focus,
        });
      }
      case 'test_builder':
        return items
          .map((item, index) => `${index + 1}. Explain in your own words: ${item} [objectives: ${index + 1}]`)
          .join('\n');
      case 'grader':
        return 'SCORE: 0.6\nREASONING: The answer covers the main idea but leaves out supporting detail.';
      default:
        return `${phrase} ${followUp}`;
    }
  }
}

const normalizeAzureBaseUrl = (endpoint: string): string => {
  const trimmed = endpoint.trim().replace(/\/+$/, '');
  if (/\/openai\/v1$/i.test(trimmed)) {
    return `${trimmed}/`;
  }

  return `${trimmed}/openai/v1/`;
};

const extractCompletionText = (completion: ChatCompletion): string => {
  const content = completion.choices[0]?.message.content;
  return typeof content === 'string' ? content.trim() : '';
};

export const toProviderError = (error: unknown): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }

  // APIConnectionTimeoutError extends APIConnectionError, so it is checked first.
  if (error instanceof APIConnectionTimeoutError) {
    return new ProviderTimeoutError(undefined, { cause: error });
  }

  if (error instanceof AuthenticationError || error instanceof PermissionDeniedError) {
    return new ProviderAuthError(undefined, { cause: error });
  }

  if (error instanceof RateLimitError) {
    return new ProviderRateLimitError(undefined, { cause: error });
  }

  return new ProviderGenericError(describeError(error), { cause: error });
};

class OpenAiLlmTool implements LlmTool {
  public constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly provider: Exclude<LlmProvider, 'mock'>,
  ) {}

  public async invoke(
    systemPrompt: string,
    history: ChatMessage[],
    options: InvokeOptions,
  ): Promise<InvokeResult> {
    const baseMaxTokens = clampCompletionTokens(options.maxTokens);

    try {
      let completion = await this.createCompletion(systemPrompt, history, options, baseMaxTokens);
      let text = extractCompletionText(completion);

      if (!text && completion.choices[0]?.finish_reason === 'length') {
        const retryMaxTokens = calculateRetryTokens(baseMaxTokens);
        logger.warn('llm_completion_truncated_retry', {
          provider: this.provider,
          purpose: options.purpose,
          baseMaxTokens,
          retryMaxTokens,
        });

        completion = await this.createCompletion(systemPrompt, history, options, retryMaxTokens);
        text = extractCompletionText(completion);
      }

      if (!text) {
        throw new ProviderGenericError('Language model returned an empty completion.');
      }

      return {
        text,
        model: completion.model.trim() || this.model,
        provider: this.provider,
      };
    } catch (error: unknown) {
      const providerError = toProviderError(error);
      logger.warn('llm_completion_failed', {
        provider: this.provider,
        purpose: options.purpose,
        kind: providerError.kind,
        error: providerError.message,
      });
      throw providerError;
    }
  }

  private createCompletion(
    systemPrompt: string,
    history: ChatMessage[],
    options: InvokeOptions,
    maxTokens: number,
  ): Promise<ChatCompletion> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: systemPrompt },
      ...history.map((message): ChatCompletionMessageParam =>
        message.role === 'user'
          ? { role: 'user', content: message.content }
          : { role: 'assistant', content: message.content },
      ),
    ];

    return this.client.chat.completions.create({
      model: this.model,
      max_completion_tokens: maxTokens,
      ...(options.temperature === undefined ? {} : { temperature: options.temperature }),
      messages,
    });
  }
}

export interface CreateLlmToolInput {
  openAiApiKey?: string;
  azureApiKey?: string;
  azureEndpoint?: string;
  azureDeployment?: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

export const createLlmTool = (input: CreateLlmToolInput): LlmTool => {
  if (input.azureApiKey && input.azureEndpoint && input.azureDeployment) {
    const client = new OpenAI({
      apiKey: input.azureApiKey,
      baseURL: normalizeAzureBaseUrl(input.azureEndpoint),
      defaultHeaders: { 'api-key': input.azureApiKey },
      timeout: input.timeoutMs,
      maxRetries: input.maxRetries,
    });

    return new OpenAiLlmTool(client, input.azureDeployment, 'azure_openai');
  }

  if (input.openAiApiKey) {
    const client = new OpenAI({
      apiKey: input.openAiApiKey,
      timeout: input.timeoutMs,
      maxRetries: input.maxRetries,
    });

    return new OpenAiLlmTool(client, input.model, 'openai');
  }

  logger.warn('llm_provider_not_configured', { fallback: 'deterministic_mock' });
  return new DeterministicMockLlmTool();
};

export const createDeterministicMockLlmTool = (): LlmTool => {
  return new DeterministicMockLlmTool();
};
