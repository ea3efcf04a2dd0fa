import OpenAI from 'openai';

import { ContentBlockedError, ProviderUnavailableError } from '../shared/errors/training-errors';
import { logger, toErrorMessage } from '../shared/logger';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy, type Sleep } from '../shared/retry';
import { normalizeWhitespace } from '../shared/text';

export interface GenerateChatCompletionInput {
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  maxTokens?: number;
  /** Content the deterministic tool echoes back when no provider is configured. */
  referenceText?: string;
}

export interface GenerateChatCompletionOutput {
  text: string;
  model: string;
  provider: 'mock' | 'azure_openai';
}

/**
 * Model generation boundary. Implementations reject with
 * `ContentBlockedError` or `ProviderUnavailableError`; nothing else escapes.
 */
export interface LlmTool {
  generateChatCompletion(input: GenerateChatCompletionInput): Promise<GenerateChatCompletionOutput>;
}

const DEFAULT_PHRASES = [
  'I just need you to take care of this quickly.',
  'This has already been approved, so there is no need to check.',
  'Everyone else on your team has done this already.',
  'I would really appreciate your help before the deadline.',
];

const DEFAULT_COMPLETION_TOKENS = 300;
const MIN_COMPLETION_TOKENS = 64;
const MAX_COMPLETION_TOKENS = 1200;
const REQUEST_TIMEOUT_MS = 30_000;

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

  return Math.max(MIN_COMPLETION_TOKENS, Math.min(MAX_COMPLETION_TOKENS, Math.floor(requested)));
};

class DeterministicMockLlmTool implements LlmTool {
  public generateChatCompletion(input: GenerateChatCompletionInput): Promise<GenerateChatCompletionOutput> {
    if (input.referenceText) {
      return Promise.resolve({
        text: normalizeWhitespace(input.referenceText),
        model: 'deterministic-mock-v1',
        provider: 'mock',
      });
    }

    const fingerprint = stableHash(`${input.systemPrompt}|${input.userPrompt}`);
    const phrase = DEFAULT_PHRASES[fingerprint % DEFAULT_PHRASES.length] ?? DEFAULT_PHRASES[0];
    const marker = fingerprint.toString(16).slice(0, 6);

    return Promise.resolve({
      text: `${phrase} [mock-${marker}]`,
      model: 'deterministic-mock-v1',
      provider: 'mock',
    });
  }
}

const normalizeAzureBaseUrl = (endpoint: string): string => {
  const trimmed = endpoint.trim().replace(/\/+$/, '');
  if (/\/openai\/v1$/i.test(trimmed)) {
    return `${trimmed}/`;
  }

  return `${trimmed}/openai/v1/`;
};

const isContentFilterError = (error: InstanceType<typeof OpenAI.APIError>): boolean => {
  return error.code === 'content_filter' || /content[_ ]filter|content management policy/i.test(error.message);
};

class AzureOpenAiLlmTool implements LlmTool {
  private readonly client: OpenAI;

  public constructor(
    apiKey: string,
    endpoint: string,
    private readonly deployment: string,
    private readonly model: string,
  ) {
    this.client = new OpenAI({
      apiKey,
      baseURL: normalizeAzureBaseUrl(endpoint),
      timeout: REQUEST_TIMEOUT_MS,
      maxRetries: 0,
    });
  }

  public async generateChatCompletion(input: GenerateChatCompletionInput): Promise<GenerateChatCompletionOutput> {
    const completion = await this.requestCompletion(input);
    const choice = completion.choices[0];

    if (choice?.finish_reason === 'content_filter') {
      logger.warn('azure_openai_content_blocked', { deployment: this.deployment, finishReason: choice.finish_reason });
      throw new ContentBlockedError(undefined, { deployment: this.deployment });
    }

    const text = choice?.message.content?.trim() ?? '';

    if (!text) {
      logger.warn('azure_openai_completion_empty', {
        deployment: this.deployment,
        finishReason: choice?.finish_reason ?? null,
      });
      throw new ProviderUnavailableError('Model provider returned an empty completion.', {
        deployment: this.deployment,
      });
    }

    return {
      text,
      model: completion.model.trim() || this.model,
      provider: 'azure_openai',
    };
  }

  private async requestCompletion(input: GenerateChatCompletionInput) {
    try {
      return await this.client.chat.completions.create({
        model: this.deployment,
        max_completion_tokens: clampCompletionTokens(input.maxTokens),
        ...(typeof input.temperature === 'number' ? { temperature: input.temperature } : {}),
        messages: [
          { role: 'system', content: input.systemPrompt },
          { role: 'user', content: input.userPrompt },
        ],
      });
    } catch (error: unknown) {
      if (error instanceof OpenAI.APIError && isContentFilterError(error)) {
        logger.warn('azure_openai_content_blocked', { deployment: this.deployment, status: error.status });
        throw new ContentBlockedError(undefined, { deployment: this.deployment });
      }

      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      logger.warn('azure_openai_completion_failed', {
        status,
        error: toErrorMessage(error),
        deployment: this.deployment,
      });
      throw new ProviderUnavailableError(undefined, { deployment: this.deployment, status });
    }
  }
}

/** Retries provider outages with backoff. Blocked content is never retried. */
class RetryingLlmTool implements LlmTool {
  public constructor(
    private readonly inner: LlmTool,
    private readonly policy: RetryPolicy,
    private readonly sleep?: Sleep,
  ) {}

  public generateChatCompletion(input: GenerateChatCompletionInput): Promise<GenerateChatCompletionOutput> {
    return withRetry(() => this.inner.generateChatCompletion(input), {
      policy: this.policy,
      operation: 'llm_generate_chat_completion',
      isRetryable: (error) => error instanceof ProviderUnavailableError,
      ...(this.sleep ? { sleep: this.sleep } : {}),
    });
  }
}

export interface CreateLlmToolInput {
  azureApiKey?: string;
  azureEndpoint?: string;
  azureDeployment?: string;
  model?: string;
  retryPolicy?: RetryPolicy;
}

export const createLlmTool = (input: CreateLlmToolInput): LlmTool => {
  if (!input.azureApiKey || !input.azureEndpoint || !input.azureDeployment) {
    return new DeterministicMockLlmTool();
  }

  return new RetryingLlmTool(
    new AzureOpenAiLlmTool(input.azureApiKey, input.azureEndpoint, input.azureDeployment, input.model ?? 'gpt-4o-mini'),
    input.retryPolicy ?? DEFAULT_RETRY_POLICY,
  );
};

export const createDeterministicMockLlmTool = (): LlmTool => {
  return new DeterministicMockLlmTool();
};

export const withLlmRetry = (tool: LlmTool, policy: RetryPolicy = DEFAULT_RETRY_POLICY, sleep?: Sleep): LlmTool => {
  return new RetryingLlmTool(tool, policy, sleep);
};
