import { z } from 'zod';

const LlmConfigSchema = z.object({
  baseUrl: z.string().url(),
  apiKey: z.string().min(1),
  model: z.string().min(1),
  timeoutMs: z.coerce.number().int().min(500).default(30000),
  temperature: z.coerce.number().min(0).max(2).default(0.3),
  maxTokens: z.coerce.number().int().min(64).optional(),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

/** Undefined when no OpenAI-compatible endpoint is configured. */
export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig | undefined {
  if (!env.LLM_PROVIDER_BASEURL || !env.LLM_API_KEY || !env.LLM_MODEL) return undefined;
  return LlmConfigSchema.parse({
    baseUrl: env.LLM_PROVIDER_BASEURL,
    apiKey: env.LLM_API_KEY,
    model: env.LLM_MODEL,
    timeoutMs: env.LLM_TIMEOUT_MS || undefined,
    temperature: env.LLM_TEMPERATURE || undefined,
    maxTokens: env.LLM_MAX_TOKENS || undefined,
  });
}
