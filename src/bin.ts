#!/usr/bin/env -S node --import tsx
import process from "node:process";

import { createNodeRuntime, runCli } from "./cli";

const code = await runCli(process.argv.slice(2), createNodeRuntime());
process.exitCode = code;
