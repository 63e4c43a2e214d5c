#!/usr/bin/env -S node --import tsx
import { ValidationPipeline } from "@coursecheck/core";
import { CLI } from "./cli";

const cli = new CLI(new ValidationPipeline());
const exitCode = await cli.run(process.argv.slice(2));
process.exit(exitCode);
