#!/usr/bin/env node
import { createProgram } from "./cli.js";
import { createApp, enableLogging } from "./logger.js";

enableLogging();
const app = createApp();

createProgram({ app }).parseAsync(process.argv).catch((err: unknown) => {
  app.error(err);
  process.exitCode = 1;
});
