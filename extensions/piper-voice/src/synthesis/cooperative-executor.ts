import { setImmediate as nextTurn } from "node:timers/promises";
import { SynthesisCancelledError } from "../errors.js";
import type { Execution } from "./inference-session.js";

export type YieldToHost = () => Promise<void>;

export const yieldToEventLoop: YieldToHost = async () => {
  await nextTurn();
};

export type CooperativeOptions = {
  signal?: AbortSignal;
  yieldToHost?: YieldToHost;
};

/**
 * Drives an execution to completion, handing control back to the host once
 * between every pair of steps. Returns the number of steps taken.
 */
export async function runCooperatively(
  execution: Execution,
  options: CooperativeOptions = {},
): Promise<number> {
  const yieldToHost = options.yieldToHost ?? yieldToEventLoop;
  let steps = 0;

  for (;;) {
    if (options.signal?.aborted) {
      execution.abandon();
      throw new SynthesisCancelledError();
    }

    const step = execution.advance();
    steps += 1;
    if (step.done) return steps;

    await (step.until ?? yieldToHost());
  }
}
