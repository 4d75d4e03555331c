/**
 * Pluggable logger for the engine.
 *
 * The engine stays free of any logging dependency; hosts install their own
 * implementation (the CLI wires its winston logger in here). With no logger
 * installed, engine diagnostics are dropped.
 */

export type EngineLogMeta = Record<string, unknown>;

export interface EngineLogger {
  debug(message: string, meta?: EngineLogMeta): void;
  info(message: string, meta?: EngineLogMeta): void;
  warn(message: string, meta?: EngineLogMeta): void;
}

let activeLogger: EngineLogger | null = null;

/**
 * Install the engine logger.
 * @param logger Logger implementation or null to disable
 */
export function setEngineLogger(logger: EngineLogger | null): void {
  activeLogger = logger;
}

export function getEngineLogger(): EngineLogger | null {
  return activeLogger;
}
