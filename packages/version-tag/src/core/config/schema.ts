import { logLevelNames } from "@vtag/logger"
import { z } from "zod"
import { MAX_ORDINAL } from "../../ports/ordinal-counter"

const flag = z.union([z.boolean(), z.stringbool()])

export const tagEnvSchema = z.object({
  RUNTIME_NAME: z.string().min(1).default("default"),
  SERVICE_NAME: z.string().min(1).default("version-tag"),

  SHARED_MEMORY: flag.default(true),
  COUNTER_START: z.coerce.bigint().min(1n).max(MAX_ORDINAL).default(1n),
  INSTANCE_ID: z
    .string()
    .regex(/^[0-9a-fA-F]{16}$/, "expected 16 hex digits")
    .refine((id) => /[1-9a-fA-F]/.test(id), "must not be zero")
    .optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type TagEnv = z.infer<typeof tagEnvSchema>
