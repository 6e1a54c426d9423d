import { createError } from "@vtag/errors"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { ConfigSource } from "../ports/source"

export type LoadConfigOptions<T> = {
  schema: z.ZodType<T>
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

/**
 * Merge `sources` in order, later ones winning, and validate the result.
 *
 * @throws {BaseError<"invalid_config">} with the failing keys and, for each,
 * the source that supplied it (`"default"` when none did)
 */
export async function loadConfig<T>({ schema, sources }: LoadConfigOptions<T>): Promise<T> {
  const merged: Record<string, unknown> = {}
  const origin: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      origin[key] = source.name
    }
  }

  const result = schema.safeParse(merged)

  if (result.success) return result.data

  const keys = result.error.issues.map((issue) => issue.path.map(String).join("."))
  const suppliedBy = Object.fromEntries(
    keys.map((key) => [key, origin[key.split(".")[0] ?? key] ?? "default"]),
  )

  throw createError(
    "invalid_config",
    `Configuration validation failed:\n${z.prettifyError(result.error)}`,
    { keys, suppliedBy },
  )
}
