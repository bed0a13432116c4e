/**
 * Ops Copilot - Zod Schema Definitions
 * Runtime validation for the YAML configuration, the tool catalog and planner output
 */

import { z } from 'zod';
import type { ParamValue } from '../types/index.js';

/**
 * Completion service (OpenAI-compatible /v1/completions endpoint)
 */
const CompletionConfigSchema = z.object({
  baseUrl: z.string().url('completion.baseUrl must be a URL'),
  model: z.string().min(1, 'completion.model must be a non-empty string'),
  maxTokens: z.number().int().positive().default(1000),
  temperature: z.number().min(0).max(2).default(0),
  timeoutMs: z.number().int().positive().default(300000),
  apiKey: z.string().min(1).default('ollama'),
});

/**
 * Tool registry (MCP server)
 */
const ToolsConfigSchema = z.object({
  serverUrl: z.string().url('tools.serverUrl must be a URL'),
  catalogPath: z.string().min(1).default('tool-catalog.json'),
  timeoutMs: z.number().int().positive().default(60000),
});

const ContextProviderConfigSchema = z.object({
  url: z.string().url('contextProvider.url must be a URL'),
  timeoutMs: z.number().int().positive().default(30000),
});

const PlannerConfigSchema = z
  .object({
    maxSteps: z.number().int().min(1).max(10).default(3),
  })
  .default({});

export const AppConfigSchema = z
  .object({
    completion: CompletionConfigSchema,
    tools: ToolsConfigSchema,
    contextProvider: ContextProviderConfigSchema,
    planner: PlannerConfigSchema,
  })
  .strict();

/**
 * JSON value accepted as a step parameter
 */
export const ParamValueSchema: z.ZodType<ParamValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ParamValueSchema),
    z.record(ParamValueSchema),
  ])
);

/**
 * A single planned step; `params` defaults to an empty mapping
 */
export const StepSchema = z.object({
  tool_name: z.string().trim().min(1, 'tool_name must be a non-empty string'),
  params: z.record(ParamValueSchema).default({}),
});

const ToolParameterSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  default: ParamValueSchema.optional(),
  required: z.boolean().optional(),
});

export const ToolCatalogSchema = z.object({
  tools: z
    .array(
      z.object({
        name: z.string().min(1),
        description: z.string().optional(),
        parameters: z.array(ToolParameterSchema).default([]),
      })
    )
    .min(1, 'Tool catalog must declare at least one tool'),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type CompletionConfig = AppConfig['completion'];
export type ContextProviderConfig = AppConfig['contextProvider'];

/**
 * Safe validation function - returns either the validated config or error details
 */
export function validateConfigSafe(data: unknown) {
  return AppConfigSchema.safeParse(data);
}
