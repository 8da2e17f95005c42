#!/usr/bin/env node

import { main } from "../src/cli/main.js";

async function run() {
  try {
    process.exitCode = await main(process.argv);
  } catch (error) {
    // main() reports its own failures; this only catches the unexpected
    if (error instanceof Error) {
      console.error(`Unexpected error: ${error.message}`);
    } else {
      console.error("An unexpected error occurred");
    }
    process.exitCode = 2;
  }
}

void run();
