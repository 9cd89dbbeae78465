import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import type { ToolgateConfig } from "./types.js";

const executionModeSchema = z.enum(["single_pass", "dual_pass_write_only", "dual_pass_all"]);

const inferenceSchema = z.object({
  baseUrl: z.string().url().default("http://127.0.0.1:8000/v1"),
  model: z.string().min(1).default("local-model"),
  apiKey: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(2048),
  requestTimeoutMs: z.number().int().positive().default(120_000),
  turnAttempts: z.number().int().min(1).max(5).default(1),
});

const executionSchema = z.object({
  mode: executionModeSchema.default("single_pass"),
  taggedCalls: z.boolean().default(true),
  maxToolRounds: z.number().int().min(1).max(20).default(5),
  defaultTimeoutSeconds: z.number().positive().default(30),
  timeoutCeilingSeconds: z.number().positive().default(300),
});

export const toolRegistryEntrySchema = z.object({
  enabled: z.boolean().default(false),
  requiresApproval: z.boolean().default(false),
  whitelist: z.array(z.string().min(1)).default([]),
  rootDirectory: z.string().optional(),
  timeoutSeconds: z.number().positive().optional(),
  mode: z.enum(["ro", "rw"]).optional(),
});

export const memoryRegistryEntrySchema = z.object({
  enabled: z.boolean().default(false),
  maxEntries: z.number().int().positive().default(10_000),
  directory: z.string().min(1),
});

const registriesSchema = z.object({
  tools: z.string().min(1).optional(),
  memories: z.string().min(1).optional(),
});

const serverSchema = z.object({
  port: z.number().int().positive().default(19890),
  hostname: z.string().default("127.0.0.1"),
});

const auditSchema = z.object({
  enabled: z.boolean().default(true),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const toolgateConfigSchema = z.object({
  inference: inferenceSchema.default({}),
  execution: executionSchema.default({}),
  tools: z.record(z.string(), toolRegistryEntrySchema).default({}),
  memories: z.record(z.string(), memoryRegistryEntrySchema).default({}),
  registries: registriesSchema.optional(),
  server: serverSchema.default({}),
  audit: auditSchema.default({}),
  logging: loggingSchema.default({}),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseConfig(raw: unknown): ToolgateConfig {
  const result = toolgateConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}
