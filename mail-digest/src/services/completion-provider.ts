/**
 * Completion provider capability
 * Any remote text-generation endpoint that takes an instruction and an input text.
 */

export type CompletionPurpose = 'summary' | 'tone';

export interface CompletionRequest {
  purpose: CompletionPurpose;
  /** System instruction */
  instruction: string;
  /** User message, already built from the prompt template */
  text: string;
}

export interface CompletionProvider {
  /**
   * Send one request and return the generated text verbatim (trimmed).
   * An empty string is a valid result.
   * @throws UpstreamCompletionError on network, HTTP or response-shape failures
   */
  send(request: CompletionRequest): Promise<string>;
}
