#!/usr/bin/env tsx

// ChatSift CLI entry point
import { createProgram } from "./program";
import { handleCliError } from "./utils/cli-error";

createProgram()
    .parseAsync(process.argv)
    .catch((error) => {
        handleCliError(error, "Fatal error in ChatSift CLI");
    });
