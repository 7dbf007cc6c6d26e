/** Singleton factory for the Anthropic SDK client used by the generation oracle. */

import Anthropic from '@anthropic-ai/sdk';

let instance: Anthropic | null = null;

export function getAnthropicClient(): Anthropic {
  if (!instance) {
    // Retries belong to the pipeline's bounded loops, not the transport.
    instance = new Anthropic({ maxRetries: 0 });
  }
  return instance;
}

/** Reset singleton (for tests). */
export function resetAnthropicClient(): void {
  instance = null;
}
