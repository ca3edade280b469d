/**
 * hclprint — CLI Commands
 */

import type { Command } from "commander";
import * as fs from "node:fs";
import { resolveConfig, toPrintOptions } from "./config.js";
import { buildHcl, sanitizeResourceName } from "./document.js";
import { HclPrintError, describeCause } from "./errors.js";
import { formatHcl } from "./hcl/printer.js";
import type { TextSink } from "./logging/index.js";
import { validateInput } from "./schema.js";
import type { ResourceEntry } from "./types.js";

export interface CliIO {
  stdout: TextSink;
  stderr: TextSink;
  readFile(path: string): string;
  writeFile(path: string, content: string): void;
  setExitCode(code: number): void;
}

export const processIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  readFile: (path) => fs.readFileSync(path, "utf-8"),
  writeFile: (path, content) => fs.writeFileSync(path, content, "utf-8"),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

type PrintCommandOptions = {
  out?: string;
  logLevel?: string;
  diagnostics: boolean;
  patches: boolean;
};

type FmtCommandOptions = {
  write?: boolean;
  check?: boolean;
};

export function createHclPrintCli(io: CliIO = processIO) {
  const fail = (message: string) => {
    io.stderr.write(`error: ${message}\n`);
    io.setExitCode(1);
  };

  return (program: Command) => {
    // ── print ───────────────────────────────────────────────────
    program
      .command("print")
      .description("Render resources and provider configuration from a JSON file as HCL")
      .argument("<file>", "JSON file: { resources: [{ ResourceType, ResourceName, Item }], provider: {...} }")
      .option("--out <file>", "Write HCL to a file instead of stdout")
      .option("--log-level <level>", "trace | debug | info | warn | error | fatal")
      .option("--no-diagnostics", "Do not dump rejected HCL when formatting fails")
      .option("--no-patches", "Skip the renderer patch rules")
      .action((file: string, opts: PrintCommandOptions) => {
        let raw: unknown;
        try {
          raw = JSON.parse(io.readFile(file));
        } catch (err) {
          fail(`cannot read ${file}: ${describeCause(err)}`);
          return;
        }

        const validation = validateInput(raw);
        if (!validation.valid || !validation.input) {
          fail(`invalid input in ${file}:\n  ${(validation.errors ?? []).join("\n  ")}`);
          return;
        }

        try {
          const config = resolveConfig({
            logLevel: opts.logLevel,
            diagnostics: opts.diagnostics,
            patches: opts.patches,
          });
          const entries: ResourceEntry[] = validation.input.resources;
          const hcl = buildHcl(entries, validation.input.provider, {
            ...toPrintOptions(config),
            diagnosticSink: io.stderr,
          });

          if (opts.out) {
            io.writeFile(opts.out, hcl);
            io.stderr.write(`${entries.length} resources written to ${opts.out}\n`);
          } else {
            io.stdout.write(hcl);
          }
        } catch (err) {
          if (err instanceof HclPrintError) {
            fail(err.message);
            return;
          }
          throw err;
        }
      });

    // ── fmt ─────────────────────────────────────────────────────
    program
      .command("fmt")
      .description("Rewrite an HCL file in canonical style (comments are not kept)")
      .argument("<file>", "HCL file")
      .option("--write", "Overwrite the file instead of printing to stdout")
      .option("--check", "Exit 1 if the file is not already formatted")
      .action((file: string, opts: FmtCommandOptions) => {
        let source: string;
        let formatted: string;
        try {
          source = io.readFile(file);
          formatted = formatHcl(source);
        } catch (err) {
          fail(`${file}: ${describeCause(err)}`);
          return;
        }

        if (opts.check) {
          if (formatted !== source) {
            io.stdout.write(`${file}\n`);
            io.setExitCode(1);
          }
          return;
        }
        if (opts.write) {
          io.writeFile(file, formatted);
          return;
        }
        io.stdout.write(formatted);
      });

    // ── sanitize-name ───────────────────────────────────────────
    program
      .command("sanitize-name")
      .description("Print Terraform-safe resource names")
      .argument("<names...>", "Resource names")
      .action((names: string[]) => {
        for (const name of names) {
          io.stdout.write(`${sanitizeResourceName(name)}\n`);
        }
      });
  };
}
