import type { TextSink } from "../exporters/section-writer";
import { ErrorHandler, ErrorLevel, toErrorLevel } from "../logging/error-handler";
import { errorMessage } from "../logging/errors";
import type { RedfishClientOptions } from "../providers/redfish-client";
import type { CollectorConfig } from "../types/schemas";
import { createCollector } from "./collector";

export interface AgentIo {
  stdout: TextSink;
  stderr: (line: string) => void;
}

export function createErrorHandler(config: CollectorConfig, stderr: (line: string) => void): ErrorHandler {
  const { level, debug } = config.logging;
  return new ErrorHandler({
    level: debug ? ErrorLevel.DEBUG : toErrorLevel(level),
    stacks: debug,
    sink: stderr
  });
}

/** Runs one collection and maps the outcome to a process exit code. */
export async function runAgent(
  config: CollectorConfig,
  io: AgentIo,
  clientOverrides: Partial<RedfishClientOptions> = {}
): Promise<number> {
  const errors = createErrorHandler(config, io.stderr);
  errors.debug(`Collecting from ${config.connection.proto}://${config.connection.host}:${config.connection.port}`, {
    sections: config.sections
  });

  try {
    await createCollector(config, io.stdout, errors, clientOverrides).collect();
    return 0;
  } catch (error) {
    errors.error(`Agent run failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
    return 1;
  }
}
