#!/usr/bin/env node
import { runCli } from "./cli.js";
import { createMemoryClient } from "./client.js";
import { resolveConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { SessionContinuity } from "./session.js";

const code = await runCli(
  process.argv.slice(2),
  {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
  },
  () => {
    const config = resolveConfig(process.env);
    const logger = createConsoleLogger(config.logLevel);
    const client = createMemoryClient(config, logger);
    return { client, session: new SessionContinuity(client, logger) };
  },
);

process.exitCode = code;
