#!/usr/bin/env node
import { CliUsageError, HELP_TEXT } from "./args.js";
import { main, StartupError } from "./cli.js";

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    console.error(`${err.message}\n${HELP_TEXT}`);
  } else if (err instanceof StartupError) {
    console.error(err.message);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
