#!/usr/bin/env node
import { EXIT_CODES } from "../config/constants.js";
import { run } from "./index.js";

process.once("SIGINT", () => {
  process.stderr.write("\n❌ Interrupted\n");
  process.exit(EXIT_CODES.interrupt);
});

process.exitCode = await run(process.argv);
