#!/usr/bin/env node
import { run } from "./core/run"

process.exitCode = await run(process.argv.slice(2))
