// pattern: Functional Core
// In-process stand-in for CommandRunner so tests never spawn pip or python

import { pino } from "pino";

import type {
  CommandResult,
  CommandRunner,
  CommandRunOptions,
} from "../utils/command/index.js";

export const testLogger = pino({ level: "silent" });

export interface RecordedCall {
  command: string;
  args: string[];
  options: CommandRunOptions;
}

export type FakeResponder = (
  command: string,
  args: string[]
) => Partial<CommandResult> | undefined;

export interface FakeRunner {
  runner: CommandRunner;
  calls: RecordedCall[];
  /** Calls rendered as "command arg arg" for compact assertions */
  commandLines: () => string[];
}

/**
 * Build a runner that answers from `respond`; unanswered commands succeed
 * with empty output.
 */
export function createFakeRunner(respond: FakeResponder = () => undefined): FakeRunner {
  const calls: RecordedCall[] = [];

  const runner: CommandRunner = (command, args, options = {}) => {
    calls.push({ command, args, options });
    const response = respond(command, args);
    return Promise.resolve({
      exitCode: 0,
      stdout: "",
      stderr: "",
      ...response,
    });
  };

  return {
    runner,
    calls,
    commandLines: () => calls.map(call => [call.command, ...call.args].join(" ")),
  };
}
