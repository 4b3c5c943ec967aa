import type { Command } from "commander";
import { describeConfig, loadConfig, validateConfig } from "../../config.ts";
import { c, formatPairs, outputJson } from "../output.ts";

export function registerConfigCommands(program: Command) {
  const config = program.command("config").description("Inspect configuration");

  // ── config validate ────────────────────────────────────────────
  config
    .command("validate")
    .description("Check that required credentials are set")
    .option("--json", "Output as JSON")
    .action((options: { json?: boolean }) => {
      const report = validateConfig(loadConfig());

      if (options.json) {
        outputJson(report);
      } else if (report.valid) {
        console.log(`${c.green("✓")} Configuration is valid`);
      } else {
        for (const name of report.missing) {
          console.log(`${c.red("✗")} Missing: ${name}`);
        }
        for (const warning of report.warnings) {
          console.log(`${c.yellow("!")} ${warning}`);
        }
      }

      if (!report.valid) process.exitCode = 1;
    });

  // ── config show ────────────────────────────────────────────────
  config
    .command("show")
    .description("Print configuration with secrets masked")
    .option("--json", "Output as JSON")
    .action((options: { json?: boolean }) => {
      const pairs = describeConfig(loadConfig());
      if (options.json) {
        outputJson(Object.fromEntries(pairs));
      } else {
        console.log(formatPairs(pairs));
      }
    });
}
