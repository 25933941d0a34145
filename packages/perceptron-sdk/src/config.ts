/**
 * Client configuration: defaults, environment loading and the checks that
 * run at call time.
 */

import { z } from "zod";
import { ConfigurationError } from "./types/index.js";

export const DEFAULT_BASE_URL = "https://api.perceptron.inc";

/** Blank values count as unset. */
const optionalSetting = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  PERCEPTRON_API_KEY: optionalSetting,
  PERCEPTRON_BASE_URL: optionalSetting,
});

export type PerceptronEnv = z.infer<typeof envSchema>;

/** Read `PERCEPTRON_API_KEY` and `PERCEPTRON_BASE_URL`. */
export function readEnv(
  env: Record<string, string | undefined> = process.env,
): PerceptronEnv {
  const result = envSchema.safeParse({
    PERCEPTRON_API_KEY: env.PERCEPTRON_API_KEY,
    PERCEPTRON_BASE_URL: env.PERCEPTRON_BASE_URL,
  });

  if (!result.success) {
    throw new ConfigurationError(
      `Invalid environment configuration: ${result.error.message}`,
      { cause: result.error },
    );
  }

  return result.data;
}

// ---------------------------------------------------------------------------
// Call-time validation
// ---------------------------------------------------------------------------

const baseUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: "must use http or https",
  });

/** Connection settings after validation. */
export interface ConnectionSettings {
  apiKey: string;
  baseUrl: string;
}

/**
 * Check the credential and base URL. Runs on every call, before the
 * request is sent.
 *
 * @throws {ConfigurationError} When the key is missing or blank, or the base
 *   URL is not an absolute http(s) URL.
 */
export function resolveConnection(settings: {
  apiKey?: string;
  baseUrl?: string;
}): ConnectionSettings {
  const apiKey = settings.apiKey?.trim();
  if (!apiKey) {
    throw new ConfigurationError(
      "No API key configured. Call withApiKey() or set PERCEPTRON_API_KEY.",
    );
  }

  const baseUrl = settings.baseUrl ?? DEFAULT_BASE_URL;
  const parsed = baseUrlSchema.safeParse(baseUrl);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid base URL "${baseUrl}": ${parsed.error.issues[0]?.message ?? "invalid URL"}`,
      { cause: parsed.error },
    );
  }

  return { apiKey, baseUrl };
}
