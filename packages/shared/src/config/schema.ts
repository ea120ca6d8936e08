import { z } from 'zod';

export const ProviderConfigSchema = z.object({
  type: z.string(),
  model: z.string(),
  api_key_env: z.string().optional(),
  api_key: z.string().optional(),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  /** Canned responses for the `fake` provider type */
  responses: z.array(z.string()).optional(),
});

export const JudgeSettingsSchema = z
  .object({
    provider: z.string().default('judge'),
    temperature: z.number().min(0).max(2).default(0.3),
    passingScore: z.number().default(70),
  })
  .default({});

export const TargetSettingsSchema = z
  .object({
    provider: z.string().default('target'),
    temperature: z.number().min(0).max(2).default(0.7),
    maxTokens: z.number().int().positive().default(150),
  })
  .default({});

export const LoggingConfigSchema = z
  .object({
    /** Append structured events to this JSONL file */
    jsonlPath: z.string().optional(),
    verbose: z.boolean().default(false),
  })
  .default({});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  providers: z.record(z.string(), ProviderConfigSchema).default({}),
  judge: JudgeSettingsSchema,
  target: TargetSettingsSchema,
  logging: LoggingConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type JudgeSettings = z.infer<typeof JudgeSettingsSchema>;
export type TargetSettings = z.infer<typeof TargetSettingsSchema>;
