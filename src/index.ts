#!/usr/bin/env node

import dotenv from "dotenv";
import { createProgram } from "./cli";
import { displayError } from "./utils/display-utils";

// Load environment variables
dotenv.config();

// Parse command line arguments
createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    displayError(error instanceof Error ? error.message : "Unknown error");
    process.exit(1);
  });
