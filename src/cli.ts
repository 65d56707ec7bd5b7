#!/usr/bin/env tsx
import { dispatch } from "./commands";
import { createNodeIO } from "./runtime/io";

process.exitCode = await dispatch(process.argv.slice(2), {
  cwd: process.cwd(),
  io: createNodeIO(),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
});
