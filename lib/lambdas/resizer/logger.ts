export type Logger = Pick<Console, "log" | "warn" | "error">

export const consoleLogger: Logger = console
