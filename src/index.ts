#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { runFlatten } from "./commands/flatten.js";
import { runShow } from "./commands/show.js";
import { runSummarize } from "./commands/summarize.js";
import { loadConfig, parseTimeout, type AppConfig } from "./config.js";

const program = new Command();

program
  .name("clinical-summarizer")
  .description("Summarize structured medical records through the clinical summary API.")
  .version("0.1.0");

program
  .command("summarize")
  .description("Flatten a medical record JSON file, request a clinical summary, store and report it")
  .argument("<input>", "Path to the medical record JSON file")
  .option("--out <name>", "Report folder name under the reports directory")
  .option("--format <format>", "Report format (markdown or html)", "markdown")
  .option("--no-store", "Skip writing the summary record")
  .option("--records-dir <dir>", "Directory for stored summary records")
  .option("--reports-dir <dir>", "Directory for generated reports")
  .option("--token <token>", "Summary API bearer token")
  .option("--base-url <url>", "Summary API base URL")
  .option("--session-id <id>", "Value sent in the session-id header")
  .option("--timeout-ms <ms>", "Abort the summary request after this many ms")
  .option("--print-input", "Print the flattened record before sending it")
  .action(async (input: string, opts) => {
    try {
      const config = withOverrides(loadConfig(), opts);
      const result = await runSummarize({
        input,
        config,
        out: opts.out,
        format: opts.format,
        store: opts.store !== false,
        printInput: opts.printInput === true,
      });
      if (result.status === "failed") {
        console.error(`[error] No summary produced (${result.reason}): ${result.message}`);
        process.exitCode = 1;
        return;
      }
      if (result.stored) {
        console.log(`Stored record ${result.recordId}`);
      }
      console.log(`Report saved to ${result.reportDir}`);
    } catch (error) {
      reportError(error);
    }
  });

program
  .command("flatten")
  .description("Print a medical record JSON file as the flattened text sent to the API")
  .argument("<input>", "Path to the medical record JSON file")
  .option("--with-prompt", "Prefix the clinical summary prompt")
  .action(async (input: string, opts) => {
    try {
      console.log(await runFlatten({ input, withPrompt: opts.withPrompt === true }));
    } catch (error) {
      reportError(error);
    }
  });

program
  .command("show")
  .description("Write the report for a stored summary record")
  .argument("<id>", "Record id")
  .option("--out <name>", "Report folder name under the reports directory")
  .option("--format <format>", "Report format (markdown or html)", "markdown")
  .option("--records-dir <dir>", "Directory for stored summary records")
  .option("--reports-dir <dir>", "Directory for generated reports")
  .action(async (id: string, opts) => {
    try {
      const { reportDir } = await runShow({
        id,
        config: withOverrides(loadConfig(), opts),
        out: opts.out,
        format: opts.format,
      });
      console.log(`Report saved to ${reportDir}`);
    } catch (error) {
      reportError(error);
    }
  });

function withOverrides(
  config: AppConfig,
  opts: { token?: string; baseUrl?: string; sessionId?: string; timeoutMs?: string; recordsDir?: string; reportsDir?: string },
): AppConfig {
  return {
    token: opts.token?.trim() || config.token,
    baseUrl: opts.baseUrl?.trim() || config.baseUrl,
    sessionId: opts.sessionId?.trim() || config.sessionId,
    timeoutMs: parseTimeout(opts.timeoutMs, "--timeout-ms") ?? config.timeoutMs,
    recordsDir: opts.recordsDir?.trim() || config.recordsDir,
    reportsDir: opts.reportsDir?.trim() || config.reportsDir,
  };
}

function reportError(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[error] ${message}`);
  process.exitCode = 1;
}

const argv = process.argv.slice();
const delimiterIndex = argv.indexOf("--");
if (delimiterIndex !== -1) {
  argv.splice(delimiterIndex, 1);
}

await program.parseAsync(argv);
