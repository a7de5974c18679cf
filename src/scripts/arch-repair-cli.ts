#!/usr/bin/env node
import "dotenv/config";
import process from "node:process";
import { runCli } from "./cli-commands.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd()
  });
}

void main();
