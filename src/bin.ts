#!/usr/bin/env node
import process from "process";
import { runCli } from "./cli";

process.exitCode = runCli(process.argv.slice(2), process.env, {
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
});
