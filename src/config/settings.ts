/**
 * Settings and Configuration Manager
 * Merges the config file, environment and command line into one raw
 * collector config and validates it against the schema.
 */

import fs from "fs";
import YAML from "yaml";
import { ConfigError, errorMessage } from "../logging/errors";
import { validateConfigSafe } from "../types/schemas";

export interface CollectorOverrides {
  host?: string;
  port?: number;
  proto?: string;
  prefix?: string;
  timeout?: number;
  retries?: number;
  verifySsl?: boolean;
  user?: string;
  password?: string;
  auth?: string;
  /** Comma separated section names. */
  sections?: string;
  logLevel?: string;
  debug?: boolean;
}

type RawObject = Record<string, unknown>;

function isRawObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): RawObject {
  if (!isRawObject(value)) {
    return {};
  }
  const nested = value[key];
  return isRawObject(nested) ? nested : {};
}

function defined(values: RawObject): RawObject {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

export function splitSections(sections: string): string[] {
  return sections
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, "utf8");
  try {
    return configPath.endsWith(".json") ? JSON.parse(raw) : YAML.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config parse error in ${configPath}: ${errorMessage(error)}`, { cause: error });
  }
}

export class SettingsManager {
  private fileConfig: unknown;
  private overrides: CollectorOverrides;
  private env: NodeJS.ProcessEnv;

  constructor(fileConfig: unknown, overrides: CollectorOverrides = {}, env: NodeJS.ProcessEnv = process.env) {
    this.fileConfig = fileConfig ?? {};
    this.overrides = overrides;
    this.env = env;
  }

  /** CLI options win over the environment, which wins over the file. */
  toRawConfig(): RawObject {
    const o = this.overrides;
    const base = isRawObject(this.fileConfig) ? this.fileConfig : {};

    const connection = {
      ...child(base, "connection"),
      ...defined({
        host: o.host,
        port: o.port,
        proto: o.proto,
        prefix: o.prefix,
        timeout: o.timeout,
        retries: o.retries,
        verify_ssl: o.verifySsl,
      }),
    };

    const credentials = {
      ...child(base, "credentials"),
      ...defined({ user: this.env.REDFISH_USER, password: this.env.REDFISH_PASSWORD }),
      ...defined({ user: o.user, password: o.password, auth: o.auth }),
    };

    const logging = {
      ...child(base, "logging"),
      ...defined({ level: o.logLevel, debug: o.debug }),
    };

    return {
      ...base,
      connection,
      credentials,
      ...defined({ sections: o.sections === undefined ? undefined : splitSections(o.sections) }),
      logging,
    };
  }

  validate() {
    return validateConfigSafe(this.toRawConfig());
  }
}
