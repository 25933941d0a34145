export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export HTTP utilities
export * from "./utils/index.js";

// Re-export the Chat Completions layer
export * from "./chat-completions/index.js";

// Re-export spatial extraction
export { extractPointing } from "./pointing.js";

// Re-export configuration helpers
export { DEFAULT_BASE_URL, readEnv, resolveConnection } from "./config.js";
export type { PerceptronEnv, ConnectionSettings } from "./config.js";

// Re-export PerceptronClient and related types
export { PerceptronClient } from "./client.js";
export type { ClientConfig, CallOptions, Middleware } from "./client.js";

// ---------------------------------------------------------------------------
// Module-level default client
// ---------------------------------------------------------------------------

import { PerceptronClient } from "./client.js";

let defaultClient: PerceptronClient | undefined;

/**
 * Set the module-level default client instance.
 */
export function setDefaultClient(client: PerceptronClient): void {
  defaultClient = client;
}

/**
 * Get the module-level default client instance.
 *
 * If none has been set, creates one via `PerceptronClient.fromEnv()` and
 * caches it.
 */
export function getDefaultClient(): PerceptronClient {
  if (!defaultClient) {
    defaultClient = PerceptronClient.fromEnv();
  }
  return defaultClient;
}

/**
 * Reset the module-level default client to undefined.
 * Primarily useful for testing.
 */
export function resetDefaultClient(): void {
  defaultClient = undefined;
}
