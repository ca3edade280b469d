#!/usr/bin/env node
import { Command } from "commander";
import { createHclPrintCli } from "../src/cli.js";
import { VERSION } from "../src/version.js";

const program = new Command("hclprint")
  .description("Render resource descriptions as canonically formatted Terraform HCL")
  .version(VERSION);

createHclPrintCli()(program);

await program.parseAsync(process.argv);
