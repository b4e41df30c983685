import { Command } from "commander"
import type { CliIo } from "../ports/cli-io"

export const CLI_NAME = "sysconf"
export const CLI_VERSION = "0.1.0"

export type CliFlags = {
  schema?: string
  logLevel?: string
  json: boolean
}

export function createProgram(io: Pick<CliIo, "stdout" | "stderr">): Command {
  return new Command()
    .name(CLI_NAME)
    .description("Parse sysctl-style key = value files, check them against a schema and print them as JSON")
    .version(CLI_VERSION)
    .argument("<file>", "config file to read, or - for standard input")
    .option("-s, --schema <path>", "YAML or JSON schema to validate against")
    .option("--log-level <level>", "minimum level of diagnostics written to stderr")
    .option("--no-json", "skip the JSON rendering")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    })
}
