#!/usr/bin/env node

import "dotenv/config";
import { exitQuietlyOnEpipe, runCli } from "./cli/program.js";

exitQuietlyOnEpipe(process.stdout);

process.exitCode = runCli(process.argv.slice(2));
