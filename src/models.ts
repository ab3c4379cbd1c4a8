/**
 * Model providers
 *
 * Gemini through the AI SDK Google provider. The API key comes from
 * configuration rather than the provider's own environment lookup.
 */

import { createGoogleGenerativeAI } from "@ai-sdk/google";

export interface ModelSettings {
  apiKey: string;
  name: string;
}

/**
 * Create the language model used for chat replies
 */
export function createModelProvider(settings: ModelSettings) {
  const google = createGoogleGenerativeAI({
    apiKey: settings.apiKey,
  });
  return google(settings.name);
}
