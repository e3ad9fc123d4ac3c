import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";
import type { DecisionChannel, DecisionRequest } from "../reconcile/application/decision-channel.ts";

export interface PromptIo {
  input: Readable;
  output: Writable;
}

export function describeDecision(request: DecisionRequest): string {
  const { entry, candidate, verdict } = request;
  return [
    "",
    `Entry ${entry.entryId} (${entry.entryType})`,
    `  original:  ${entry.fields.title ?? "(no title)"} [${entry.fields.year ?? "?"}]`,
    `  candidate: ${candidate.fields.title ?? "(no title)"} [${candidate.fields.year ?? "?"}] from ${candidate.sourceTag}`,
    `  checks:    ${verdict.reason}`,
  ].join("\n");
}

export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/** Asks on the terminal whether to accept an uncertain candidate. Anything but yes declines. */
export function createPromptDecisionChannel(io: PromptIo = { input: process.stdin, output: process.stdout }): {
  decide: DecisionChannel;
  close: () => void;
} {
  const rl = createInterface({ input: io.input, output: io.output });

  const decide: DecisionChannel = async (request) => {
    io.output.write(`${describeDecision(request)}\n`);
    const answer = await rl.question("Accept this candidate? [y/N] ");
    return isAffirmative(answer);
  };

  return { decide, close: () => rl.close() };
}
