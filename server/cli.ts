#!/usr/bin/env node
import { defaultIO } from "./cli/io";
import { runCli } from "./cli/run";

process.exitCode = await runCli({
  argv: process.argv.slice(2),
  io: defaultIO(),
});
