#!/usr/bin/env tsx
import "dotenv/config";
import { messageOf } from "../errors.ts";
import { exitError } from "./output.ts";
import { createProgram } from "./program.ts";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => exitError(messageOf(error)));
