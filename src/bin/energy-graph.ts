#!/usr/bin/env node
import pico from "picocolors";
import { runGraphCli } from "../cli/RenderGraphCLI.ts";

runGraphCli().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(pico.red(message));
  process.exitCode = 1;
});
