#!/usr/bin/env tsx
import { program } from "commander";
import pkg from "../package.json" with { type: "json" };
import { registerCheckAccountCommand } from "./commands/index.ts";

const { version } = pkg;

/**
 * CLI entry point
 */

program
  .name("starkcheck")
  .description(pkg.description)
  .version(version);

registerCheckAccountCommand(program);

await program.parseAsync();
