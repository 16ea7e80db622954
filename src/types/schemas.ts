import { z } from "zod";
import { SECTION_NAMES } from "./sections";

export const SectionNameSchema = z.enum(SECTION_NAMES);

export const ConnectionSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(443),
  proto: z.enum(["https", "http"]).default("https"),
  prefix: z.string().startsWith("/").default("/redfish/v1"),
  // seconds
  timeout: z.number().positive().default(3),
  retries: z.number().int().min(0).max(10).default(2),
  verify_ssl: z.boolean().default(false),
}).strict();

export const CredentialsSchema = z.object({
  user: z.string().min(1),
  password: z.string().min(1),
  auth: z.enum(["session", "basic"]).default("session"),
}).strict();

export const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  debug: z.boolean().default(false),
}).strict();

export const CollectorConfigSchema = z.object({
  connection: ConnectionSchema,
  credentials: CredentialsSchema,
  sections: z.array(SectionNameSchema).min(1).default([...SECTION_NAMES]),
  logging: LoggingSchema.default({}),
}).strict();

// Export types
export type CollectorConfig = z.infer<typeof CollectorConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionSchema>;
export type CredentialsConfig = z.infer<typeof CredentialsSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
export type AuthMode = CredentialsConfig["auth"];

// Validation helpers
export const validateConfig = (data: unknown): CollectorConfig => {
  return CollectorConfigSchema.parse(data);
};

export const validateConfigSafe = (data: unknown) => {
  return CollectorConfigSchema.safeParse(data);
};

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "root";
    return `- ${path}: ${issue.message}`;
  });
}
