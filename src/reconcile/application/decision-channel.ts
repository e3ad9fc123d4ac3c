import type {
  RawEntry,
  RawRecord,
  ValidationVerdict,
} from "../domain/models/reconciliation.ts";

export interface DecisionRequest {
  entry: RawEntry;
  candidate: RawRecord;
  verdict: ValidationVerdict;
  identifier: string | null;
}

/** Resolves true to accept an UNCERTAIN candidate. */
export type DecisionChannel = (request: DecisionRequest) => Promise<boolean>;

export const alwaysReject: DecisionChannel = async () => false;

/** Keeps concurrent workers from asking at the same time. */
export function serializeDecisions(channel: DecisionChannel): DecisionChannel {
  let tail: Promise<unknown> = Promise.resolve();
  return (request) => {
    const next = tail.then(() => channel(request));
    tail = next.catch(() => undefined);
    return next;
  };
}
