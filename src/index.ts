#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { renderError, runDewpoint } from "./cli.js";
import { ConfigError } from "./errors.js";

const io = {
  stdout: (text: string) => void process.stdout.write(text),
  stderr: (text: string) => void process.stderr.write(text)
};

try {
  const cfg = loadConfig();
  process.exitCode = runDewpoint(process.argv.slice(2), { config: cfg, io });
} catch (e) {
  if (!(e instanceof ConfigError)) throw e;
  io.stderr(renderError(e));
  process.exitCode = 1;
}
