import { CommanderError } from "commander"
import { type Logger, PinoLogger } from "@sysconf/logger"
import {
  FileTextSource,
  parse,
  parseSchema,
  StreamTextSource,
  type TextSource,
} from "@sysconf/sysctl"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource } from "../adapters/env/env-source"
import { FlagSource } from "../adapters/flags/flag-source"
import type { CliIo } from "../ports/cli-io"
import type { ISettings } from "../ports/settings"
import { type CliFlags, CLI_NAME, createProgram } from "./program"
import { formatError, renderReport } from "./report"
import { loadSettings } from "./settings/load-settings"
import { type CliSettings, SETTINGS_PREFIX, settingsSchema } from "./settings/settings-schema"

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Usage: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export type RunOptions = {
  io?: Partial<CliIo>
  /** Replaces the logger built from settings. */
  logger?: Logger
}

function resolveIo(io: Partial<CliIo> = {}): CliIo {
  return {
    stdin: io.stdin ?? process.stdin,
    stdout: io.stdout ?? process.stdout,
    stderr: io.stderr ?? process.stderr,
    env: io.env ?? process.env,
    cwd: io.cwd ?? process.cwd(),
  }
}

/**
 * Runs the `sysconf` command and resolves to the process exit code.
 *
 * @param argv - user arguments, without the node binary and script path
 */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<ExitCode> {
  const io = resolveIo(options.io)
  const program = createProgram(io)

  try {
    program.parse([...argv], { from: "user" })
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? ExitCode.Ok : ExitCode.Usage
    }
    throw err
  }

  const flags = program.opts<CliFlags>()
  const file = program.args[0]

  if (file === undefined) {
    return ExitCode.Usage
  }

  let settings: ISettings<CliSettings>

  try {
    settings = await loadCliSettings(io, flags)
  } catch (err) {
    io.stderr.write(`${formatError(err)}\n`)
    return ExitCode.Failure
  }

  const logger = (options.logger ?? createLogger(io, settings)).child({ command: CLI_NAME })

  logger.debug("Settings loaded", { sources: settings.sourcesUsed() })

  const unknownKeys = settings.unknownKeys()
  if (unknownKeys.length > 0) {
    logger.warn("Ignoring unknown settings", { unknownKeys })
  }

  const startedAt = Date.now()

  try {
    await execute(file, flags, settings, io, logger)
    logger.info("Run finished", { durationMs: Date.now() - startedAt })
    return ExitCode.Ok
  } catch (err) {
    logger.debug("Run failed", { err, durationMs: Date.now() - startedAt })
    io.stderr.write(`${formatError(err)}\n`)
    return ExitCode.Failure
  }
}

async function execute(
  file: string,
  flags: CliFlags,
  settings: ISettings<CliSettings>,
  io: CliIo,
  logger: Logger,
): Promise<void> {
  const source: TextSource =
    file === "-" ? new StreamTextSource(io.stdin) : new FileTextSource({ file, cwd: io.cwd })
  const log = logger.child({ source: source.name })

  const store = parse(await source.read())
  log.debug("Parsed configuration", { entries: store.size })

  if (flags.schema !== undefined) {
    const schemaSource = new FileTextSource({ file: flags.schema, cwd: io.cwd })

    io.stdout.write(`Loading schema: ${flags.schema}\n`)
    const schema = parseSchema(await schemaSource.read())
    log.debug("Schema loaded", { schema: schemaSource.name, fields: schema.size })

    io.stdout.write("Validating settings against schema...\n")
    store.validate(schema)
    io.stdout.write("Schema validation passed\n")
  }

  io.stdout.write(
    renderReport(store, { json: flags.json, indent: settings.get("JSON_INDENT") }),
  )
}

function loadCliSettings(io: CliIo, flags: CliFlags): Promise<ISettings<CliSettings>> {
  return loadSettings({
    schema: settingsSchema,
    sources: [
      new DotenvSource({ file: ".env", required: false, prefix: SETTINGS_PREFIX, cwd: io.cwd }),
      new EnvSource({ prefix: SETTINGS_PREFIX, env: io.env }),
      new FlagSource({ LOG_LEVEL: flags.logLevel }),
    ],
  })
}

function createLogger(io: CliIo, settings: ISettings<CliSettings>): Logger {
  return new PinoLogger(
    { destination: io.stderr },
    { level: settings.get("LOG_LEVEL"), prettify: settings.get("LOG_PRETTY") },
  )
}
