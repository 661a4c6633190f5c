import { z } from "zod";
import { DEFAULT_MODEL, DEFAULT_OLLAMA_URL } from "../analysis/types.js";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const DefaultsSchema = z.object({
  logLevel: LogLevelSchema.default("info"),
  queryTimeout: z.number().default(30000),
  slowQueryMs: z.number().default(1000),
});

const OllamaConfigSchema = z.object({
  url: z.string().url().default(DEFAULT_OLLAMA_URL),
  model: z.string().min(1).default(DEFAULT_MODEL),
  requestTimeout: z.number().positive().optional(),
});

const AnalyzerConfigSchema = z.object({
  connectionString: z.string().optional(),
});

const HttpTransportConfigSchema = z.object({
  type: z.literal("http"),
  port: z.number().default(3000),
  host: z.string().default("127.0.0.1"),
  stateless: z.boolean().default(false),
  sessionTimeout: z.number().default(30 * 60 * 1000), // 30 minutes
  auth: z
    .object({
      type: z.literal("bearer"),
      token: z.string(),
    })
    .optional(),
});

const StdioTransportConfigSchema = z.object({
  type: z.literal("stdio"),
});

const TransportConfigSchema = z.discriminatedUnion("type", [StdioTransportConfigSchema, HttpTransportConfigSchema]);

export const AppConfigSchema = z.object({
  transport: TransportConfigSchema.optional().default({ type: "stdio" }),
  defaults: DefaultsSchema.optional().transform(
    (v) =>
      v ?? {
        logLevel: "info" as const,
        queryTimeout: 30000,
        slowQueryMs: 1000,
      },
  ),
  ollama: OllamaConfigSchema.optional().transform((v) => v ?? { url: DEFAULT_OLLAMA_URL, model: DEFAULT_MODEL }),
  analyzer: AnalyzerConfigSchema.optional().transform((v) => v ?? {}),
});

export type Defaults = z.infer<typeof DefaultsSchema>;
export type OllamaConfig = z.infer<typeof OllamaConfigSchema>;
export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type HttpTransportConfig = z.infer<typeof HttpTransportConfigSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;
