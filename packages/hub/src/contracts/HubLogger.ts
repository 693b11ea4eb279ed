/**
 * Diagnostic logger for the hub and its collaborators.
 *
 * This is separate from the delivery log (see `DeliveryLog`): it reports
 * lifecycle steps and failures, not the events being forwarded.
 */
export interface HubLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const consoleLogger: HubLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Render an unknown thrown value for a log record.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
