import type { TaskLogger } from "@/logging";

interface CreateDiagnosticsLogParams {
  diagnostics?: boolean;
  logger: TaskLogger;
}

/**
 * Creates a prefixed log function for internal wiring messages.
 * Writes at info level when diagnostics are on, at debug otherwise.
 *
 * @param prefix - Component identifier e.g. "TaskServer", "REST"
 * @returns A log function: (message, data?) => void
 */
export function createDiagnosticsLog(
  prefix: string,
  params: CreateDiagnosticsLogParams
): (message: string, data?: unknown) => void {
  const { logger } = params;
  const write = params.diagnostics ? logger.info : logger.debug;

  return (message: string, data?: unknown) => {
    write({ atFunction: prefix, message: `[${prefix}] ${message}`, data });
  };
}
