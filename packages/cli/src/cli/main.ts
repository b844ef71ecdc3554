#!/usr/bin/env node
// pattern: Imperative Shell

import { runCli } from "./index.js";

process.exitCode = await runCli(process.argv);
