#!/usr/bin/env node
import { createProgram } from "./program.js";

void createProgram()
  .parseAsync(process.argv)
  .catch((error) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  });
