import { Command } from "commander";
import { registerAnalyzeCommand } from "./commands/analyze.ts";
import { registerCompleteCommand } from "./commands/complete.ts";

export const CLI_NAME = "bib-reconcile";
export const CLI_VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();
  program
    .name(CLI_NAME)
    .description("Complete and reconcile BibTeX entries against publisher APIs, Crossref and Semantic Scholar")
    .version(CLI_VERSION);

  registerCompleteCommand(program);
  registerAnalyzeCommand(program);
  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv]);
}

export { EXIT_CODES, type ExitCode } from "./exit-codes.ts";
export { analyzeEntries, executeAnalyze, formatAnalysis } from "./commands/analyze.ts";
export { executeComplete } from "./commands/complete.ts";
