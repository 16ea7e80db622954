#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import path from "path";
import fs from "fs";
import { z } from "zod";
import { formatServiceResults, runChecks } from "../checks/services";
import { parseAgentOutput } from "../checks/parse";
import { readConfigFile, SettingsManager } from "../config/settings";
import { runAgent } from "../core/agent";
import { errorMessage } from "../logging/errors";
import { buildMetrics } from "../metrics/sensor-metrics";
import { CollectorConfigSchema, formatIssues } from "../types/schemas";
import type { CollectorConfig } from "../types/schemas";
import { outputSectionName, SECTION_DESCRIPTIONS, SECTION_NAMES } from "../types/sections";

const program = new Command();

const CollectOptionsSchema = z.object({
  config: z.string().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  port: z.number().optional(),
  proto: z.string().optional(),
  prefix: z.string().optional(),
  timeout: z.number().optional(),
  retries: z.number().optional(),
  sections: z.string().optional(),
  auth: z.string().optional(),
  verifySsl: z.boolean().optional(),
  logLevel: z.string().optional(),
  debug: z.boolean().optional(),
});

type CollectOptions = z.infer<typeof CollectOptionsSchema>;

const FileOptionsSchema = z.object({ config: z.string().optional(), output: z.string().optional() });

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function readConfig(host: string | undefined, opts: CollectOptions): CollectorConfig | undefined {
  const configPath = opts.config || process.env.REDFISH_AGENT_CONFIG;
  let fileConfig: unknown = {};
  try {
    fileConfig = configPath ? readConfigFile(path.resolve(configPath)) : {};
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return undefined;
  }

  const result = new SettingsManager(fileConfig, { ...opts, host }).validate();
  if (!result.success) {
    console.error("❌ Config validation failed:");
    formatIssues(result.error).forEach((line) => console.error(line));
    return undefined;
  }
  return result.data;
}

function readInput(file?: string): string {
  return file && file !== "-" ? fs.readFileSync(file, "utf8") : fs.readFileSync(0, "utf8");
}

program
  .name("redfish-agent")
  .description("Collects Redfish BMC inventory and health as agent sections")
  .version("1.0.0");

program
  .command("collect", { isDefault: true })
  .description("Log in to the BMC, walk the resource graph and print agent sections")
  .argument("[host]", "BMC host name or address")
  .option("-c, --config <path>", "Path to config file (YAML or JSON)")
  .option("-u, --user <user>", "User name")
  .option("-s, --password <password>", "Password (or REDFISH_PASSWORD)")
  .option("-p, --port <port>", "Port", parseNumber)
  .option("-P, --proto <proto>", "Protocol: https or http")
  .option("--prefix <path>", "Service root path")
  .option("--timeout <seconds>", "Request timeout in seconds", parseNumber)
  .option("--retries <count>", "Retries per request on transport errors", parseNumber)
  .option("--sections <list>", `Comma separated sections (default: all)`)
  .option("--auth <mode>", "Authentication: session or basic")
  .option("--verify-ssl", "Verify the BMC certificate")
  .option("--log-level <level>", "debug, info, warn or error")
  .option("--debug", "Debug logging with stack traces")
  .action(async (host: string | undefined, rawOpts: unknown) => {
    const opts = CollectOptionsSchema.parse(rawOpts);
    const cfg = readConfig(host, opts);
    if (!cfg) {
      process.exitCode = 2;
      return;
    }
    process.exitCode = await runAgent(cfg, {
      stdout: process.stdout,
      stderr: (line) => process.stderr.write(`${line}\n`)
    });
  });

program
  .command("sections")
  .description("List the sections the agent can collect")
  .action(() => {
    for (const name of SECTION_NAMES) {
      console.log(`${name.padEnd(20)} ${outputSectionName(name).padEnd(26)} ${SECTION_DESCRIPTIONS[name]}`);
    }
  });

program
  .command("validate")
  .description("Validate configuration against schema")
  .option("-c, --config <path>", "Path to config file")
  .action((rawOpts: unknown) => {
    const opts = CollectOptionsSchema.parse(rawOpts);
    const cfg = readConfig(undefined, opts);
    if (!cfg) {
      process.exitCode = 2;
      return;
    }
    console.log("✅ Configuration is valid.");
    console.log(`🌐 Endpoint: ${cfg.connection.proto}://${cfg.connection.host}:${cfg.connection.port}${cfg.connection.prefix}`);
    console.log(`🔐 Auth: ${cfg.credentials.auth} as ${cfg.credentials.user}`);
    console.log(`📋 Sections: ${cfg.sections.join(", ")}`);
  });

program
  .command("schema:emit")
  .description("Emit JSON Schema from Zod")
  .option("-o, --output <path>", "Output file", "./docs/config.schema.json")
  .action(async (rawOpts: unknown) => {
    const opts = FileOptionsSchema.parse(rawOpts);
    const output = opts.output ?? "./docs/config.schema.json";
    try {
      const { zodToJsonSchema } = await import("zod-to-json-schema");
      const schema = zodToJsonSchema(CollectorConfigSchema, "CollectorConfig");
      fs.mkdirSync(path.dirname(output), { recursive: true });
      fs.writeFileSync(output, JSON.stringify(schema, null, 2));
      console.log(`✅ Wrote JSON Schema to ${output}`);
    } catch (error) {
      console.error(`❌ Schema emit failed: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

program
  .command("check")
  .description("Evaluate health from agent output")
  .argument("[file]", "Agent output file, - for stdin")
  .action((file: string | undefined) => {
    const services = runChecks(parseAgentOutput(readInput(file)));
    process.stdout.write(formatServiceResults(services));
  });

program
  .command("metrics")
  .description("Render sensor readings and health from agent output as OpenMetrics")
  .argument("[file]", "Agent output file, - for stdin")
  .action((file: string | undefined) => {
    const sections = parseAgentOutput(readInput(file));
    process.stdout.write(buildMetrics(sections, runChecks(sections)).export());
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`❌ ${errorMessage(error)}`);
  process.exitCode = 1;
});
