import type { DestinationStream } from "pino"
import { createPinoLogger } from "@reprkit/logger"
import { loadBinaryConfig, type LoadBinaryConfigOptions } from "./config/load-binary-config"
import { createBinary } from "./core/binary-service"
import type { Binary } from "./ports/binary"

export type CreateBinaryFromEnvOptions = LoadBinaryConfigOptions & {
  /** Log destination; defaults to stdout. */
  destination?: DestinationStream
}

/**
 * Builds a {@link Binary} from `REPR_*` configuration, logging through pino.
 *
 * @throws ConfigError `config_invalid` when the configuration does not validate.
 */
export async function createBinaryFromEnv(
  options: CreateBinaryFromEnvOptions = {},
): Promise<Binary> {
  const { destination, ...loadOptions } = options
  const { logging, ...config } = await loadBinaryConfig(loadOptions)

  const logger = createPinoLogger(
    { ...(destination && { destination }) },
    { level: logging.level, prettify: logging.prettify },
    { service: logging.serviceName },
  )

  return createBinary({ logger, config })
}
