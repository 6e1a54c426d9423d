/** Level names, least severe first. pino numbers them 10 to 60 in this order. */
export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]
