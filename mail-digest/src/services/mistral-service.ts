/**
 * Mistral AI Service
 * Completion provider backed by the Mistral chat completion API
 */

import { Mistral } from '@mistralai/mistralai';
import logger from '../utils/logger.js';
import { ConfigError, UpstreamCompletionError, isMailDigestError, toErrorMessage } from '../utils/errors.js';
import type { AppConfig } from '../utils/config-loader.js';
import type { CompletionProvider, CompletionRequest } from './completion-provider.js';

export type MistralServiceConfig = Pick<AppConfig, 'mistralApiKey' | 'mistralTimeoutMs' | 'dryRun' | 'llm'>;

// Bounded SDK retries on 429/5xx and connection errors; same payload every attempt
const RETRY_BACKOFF = {
  initialInterval: 500,
  maxInterval: 5000,
  exponent: 1.5,
  maxElapsedTime: 15000
};

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function contentToText(content: unknown): string | null {
  if (typeof content === 'string') return content;

  if (Array.isArray(content)) {
    return content
      .map((chunk: unknown) => {
        if (typeof chunk === 'object' && chunk !== null && 'text' in chunk && typeof chunk.text === 'string') {
          return chunk.text;
        }
        return '';
      })
      .join('');
  }

  return null;
}

class MistralService implements CompletionProvider {
  private client: Mistral | null;
  private dryRun: boolean;
  private llm: MistralServiceConfig['llm'];

  constructor(config: MistralServiceConfig) {
    this.dryRun = config.dryRun;
    this.llm = config.llm;

    if (this.dryRun) {
      logger.info('DRY_RUN mode enabled - API calls will be simulated');
      this.client = null;
      return;
    }

    if (!config.mistralApiKey) {
      throw new ConfigError('MISTRAL_API_KEY is required', 'MISTRAL_API_KEY');
    }

    this.client = new Mistral({
      apiKey: config.mistralApiKey,
      timeoutMs: config.mistralTimeoutMs,
      retryConfig: {
        strategy: 'backoff',
        backoff: RETRY_BACKOFF,
        retryConnectionErrors: true
      }
    });

    logger.info('Mistral client initialized');
    logger.info(`   Summary model: ${this.llm.summary.model}, tone model: ${this.llm.tone.model}`);
  }

  /**
   * Generate a mock response for dry-run mode
   */
  private generateDryRunResponse(request: CompletionRequest): string {
    if (request.purpose === 'tone') {
      return 'neutral (dry-run)';
    }
    return `- [DRY-RUN] Simulated summary of ${request.text.length} characters`;
  }

  async send(request: CompletionRequest): Promise<string> {
    const startTime = Date.now();

    if (this.dryRun || !this.client) {
      logger.info(`[DRY-RUN] Simulating ${request.purpose} request (${request.text.length} chars)`);
      return this.generateDryRunResponse(request);
    }

    const config = this.llm[request.purpose];

    try {
      logger.debug(`Calling Mistral API (${request.purpose}, model ${config.model})...`);

      const response = await this.client.chat.complete({
        model: config.model,
        messages: [
          { role: 'system', content: request.instruction },
          { role: 'user', content: request.text }
        ],
        maxTokens: config.max_output_tokens,
        temperature: config.temperature
      });

      const processingTime = Date.now() - startTime;
      const text = contentToText(response.choices?.[0]?.message?.content);

      if (text === null) {
        throw new UpstreamCompletionError('Malformed response from Mistral API: no message content');
      }

      logger.debug(`Mistral ${request.purpose} completed in ${processingTime}ms (${text.length} chars)`);
      return text.trim();
    } catch (error) {
      if (isMailDigestError(error)) {
        logger.error(`Mistral API error (${request.purpose}):`, error.message);
        throw error;
      }

      const processingTime = Date.now() - startTime;
      const statusCode = statusCodeOf(error);
      const message = toErrorMessage(error);

      if (statusCode === 429) {
        logger.error('Mistral API rate limit exceeded');
        throw new UpstreamCompletionError('Rate limit exceeded, please try again later', { statusCode, cause: error });
      }

      if (statusCode === 401) {
        logger.error('Mistral API authentication failed');
        throw new UpstreamCompletionError('Invalid API key', { statusCode, cause: error });
      }

      if (message.toLowerCase().includes('timeout') || message.toLowerCase().includes('timed out')) {
        logger.error('Mistral API timeout:', message);
        throw new UpstreamCompletionError(`Request timed out after ${processingTime}ms`, { statusCode, cause: error });
      }

      logger.error('Mistral API error:', message);
      throw new UpstreamCompletionError(`Mistral API error: ${message}`, { statusCode, cause: error });
    }
  }
}

export default MistralService;
