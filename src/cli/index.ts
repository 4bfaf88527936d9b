#!/usr/bin/env node
import { createSubsystemLogger } from "../logging/subsystem.js";
import { createProgram } from "./program.js";

const log = createSubsystemLogger("cli");

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    log.debug("Command failed", { error: message });
    console.error(`Error: ${message}`);
    process.exit(1);
  });
