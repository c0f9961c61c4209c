/**
 * Summary Service
 * Turns email text into a bullet-point summary and a short tone label.
 *
 * Long emails are summarized map-reduce style: each chunk is summarized,
 * then the chunk summaries are summarized once more.
 */

import logger from '../utils/logger.js';
import type { LLMConfig, ConfigType } from '../utils/config-loader.js';
import { chunkText, fillTemplate, sanitizeMarkdown, truncateText } from '../utils/text-utils.js';
import type { CompletionProvider } from './completion-provider.js';

export const MAX_EMAIL_CHARS = 8000;
export const MAX_CHUNK_CHARS = 1500;
export const MAX_REQUEST_CHARS = 2000;
export const MAX_REDUCE_INPUT_CHARS = 3000;
export const MAX_SUMMARY_CHARS = 800;

export interface SummaryResult {
  summary: string;
  tone: string;
}

export type PromptConfigs = Readonly<Record<ConfigType, Readonly<Pick<LLMConfig, 'system_prompt' | 'user_prompt'>>>>;

class SummaryService {
  private provider: CompletionProvider;
  private prompts: PromptConfigs;

  constructor(provider: CompletionProvider, prompts: PromptConfigs) {
    this.provider = provider;
    this.prompts = prompts;
  }

  private async complete(type: ConfigType, text: string): Promise<string> {
    const prompt = this.prompts[type];
    return this.provider.send({
      purpose: type,
      instruction: prompt.system_prompt,
      text: fillTemplate(prompt.user_prompt, { email: truncateText(text, MAX_REQUEST_CHARS) })
    });
  }

  async summarizeChunk(text: string): Promise<string> {
    return sanitizeMarkdown(await this.complete('summary', text)).trim();
  }

  /**
   * Summarize every chunk concurrently, then summarize the joined summaries
   */
  async summarizeText(text: string): Promise<string> {
    const chunks = chunkText(text, MAX_CHUNK_CHARS);

    if (chunks.length === 1) {
      return (await this.summarizeChunk(chunks[0])).slice(0, MAX_SUMMARY_CHARS);
    }

    logger.info(`Map-reduce summary over ${chunks.length} chunks`);
    const chunkSummaries = await Promise.all(chunks.map(chunk => this.summarizeChunk(chunk)));
    const combined = chunkSummaries.filter(s => s.length > 0).join('\n');

    if (!combined) {
      return '';
    }

    const reduced = await this.summarizeChunk(
      `Summarize these email summaries briefly:\n\n${combined.slice(0, MAX_REDUCE_INPUT_CHARS)}`
    );
    return reduced.slice(0, MAX_SUMMARY_CHARS);
  }

  async analyzeTone(text: string): Promise<string> {
    return (await this.complete('tone', text)).trim();
  }

  /**
   * Summary and tone of an email body.
   * Empty text yields empty results without any remote call.
   * @throws UpstreamCompletionError when the completion service fails
   */
  async summarize(text: string): Promise<SummaryResult> {
    const input = text.trim().slice(0, MAX_EMAIL_CHARS);

    if (!input) {
      logger.debug('Empty text, skipping summary and tone requests');
      return { summary: '', tone: '' };
    }

    const [summary, tone] = await Promise.all([this.summarizeText(input), this.analyzeTone(input)]);
    return { summary, tone };
  }
}

export default SummaryService;
