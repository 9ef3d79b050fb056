#!/usr/bin/env -S npx tsx

/**
 * CLI entry point for structmatch
 */

import { createProgram } from "./program";

await createProgram().parseAsync();
