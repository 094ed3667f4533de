/**
 * Minimal logging surface used across the transport. `console` satisfies it.
 */
export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export const defaultLogger: Logger = console;
