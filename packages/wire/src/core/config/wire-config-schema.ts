import { logLevelNames } from "@wirepact/logger"
import { z } from "zod"
import { DEFAULT_MAX_DECODE_BYTES } from "../budget"
import { DEFAULT_MAX_DEPTH } from "../io"

export const wireConfigSchema = z.object({
  WIRE_MAX_DECODE_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_DECODE_BYTES),
  WIRE_MAX_DEPTH: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
  WIRE_LOG_LEVEL: z.enum(logLevelNames).default("info"),
  WIRE_LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type WireConfigValues = z.infer<typeof wireConfigSchema>
