// pattern: Functional Core
// In-memory InstallationManager that records what it was asked to do

import type { OperationOutcome } from "../installer/types.js";
import type { InstallationManager } from "../orchestrator/installation-lease.js";

export interface FakeInstaller {
  installer: InstallationManager;
  /** "install <name>" and "uninstall <name>" in call order */
  events: string[];
}

export function createFakeInstaller(installed: Iterable<string> = []): FakeInstaller {
  const present = new Set(installed);
  const events: string[] = [];
  const ok: OperationOutcome = { ok: true };

  return {
    events,
    installer: {
      isInstalled: name => Promise.resolve(present.has(name)),
      install: name => {
        events.push(`install ${name}`);
        present.add(name);
        return Promise.resolve(ok);
      },
      uninstall: name => {
        events.push(`uninstall ${name}`);
        present.delete(name);
        return Promise.resolve(ok);
      },
    },
  };
}
