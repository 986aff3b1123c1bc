import { logLevelNames } from "@reprkit/logger"
import { z } from "zod"
import { DEFAULT_INITIAL_CAPACITY } from "../adapters/sinks/growable-buffer"

const flag = (fallback: boolean) => z.union([z.boolean(), z.stringbool()]).default(fallback)

/**
 * Raw keys, as they appear once the `REPR_` prefix is stripped.
 */
export const binaryConfigSchema = z
  .object({
    PRESIZE: flag(true),
    INITIAL_CAPACITY: z.coerce.number().int().positive().default(DEFAULT_INITIAL_CAPACITY),
    STRICT_DECODE: flag(true),
    LOG_LEVEL: z.enum(logLevelNames).default("info"),
    LOG_PRETTY: flag(false),
    SERVICE_NAME: z.string().min(1).default("reprkit"),
  })
  .transform((raw) => ({
    presize: raw.PRESIZE,
    initialCapacity: raw.INITIAL_CAPACITY,
    strictDecode: raw.STRICT_DECODE,
    logging: {
      level: raw.LOG_LEVEL,
      prettify: raw.LOG_PRETTY,
      serviceName: raw.SERVICE_NAME,
    },
  }))

export type BinaryConfigInput = z.input<typeof binaryConfigSchema>

export type BinaryConfig = z.output<typeof binaryConfigSchema>

/** Service options, i.e. the config without its logging part. */
export type BinaryOptions = Omit<BinaryConfig, "logging">
