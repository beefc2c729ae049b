import { describe, it, expect } from "vitest";
import { executeDot, executeDots } from "../lib/executor";
import type { ScriptRunner } from "../lib/runner";
import type { Dot, DotOutcome, PlannedDot } from "../types";

function dot(name: string, scripts: { install?: boolean; setup?: boolean } = {}): Dot {
  return {
    name,
    path: `/dotfiles/${name}`,
    installScript: scripts.install ? `/dotfiles/${name}/install.sh` : null,
    setupScript: scripts.setup === false ? null : `/dotfiles/${name}/setup.sh`,
  };
}

/**
 * Runner that records calls and fails the scripts it is told to
 */
function fakeRunner(failing: string[] = []): { runner: ScriptRunner; calls: string[] } {
  const calls: string[] = [];
  const runner: ScriptRunner = async (script) => {
    calls.push(script);
    if (failing.includes(script)) {
      return { ok: false, script, reason: "exit", exitCode: 1 };
    }
    return { ok: true, script, exitCode: 0 };
  };
  return { runner, calls };
}

describe("executeDot", () => {
  it("runs setup only when not asked to install", async () => {
    const { runner, calls } = fakeRunner();
    const outcome = await executeDot({ dot: dot("bash", { install: true }), toInstall: false }, runner);

    expect(calls).toEqual(["/dotfiles/bash/setup.sh"]);
    expect(outcome.status).toBe("succeeded");
  });

  it("runs install before setup", async () => {
    const { runner, calls } = fakeRunner();
    const outcome = await executeDot({ dot: dot("starship", { install: true }), toInstall: true }, runner);

    expect(calls).toEqual(["/dotfiles/starship/install.sh", "/dotfiles/starship/setup.sh"]);
    expect(outcome).toEqual({
      status: "succeeded",
      dot: dot("starship", { install: true }),
      install: { ok: true, script: "/dotfiles/starship/install.sh", exitCode: 0 },
      setup: { ok: true, script: "/dotfiles/starship/setup.sh", exitCode: 0 },
    });
  });

  it("goes straight to setup when there is no install script", async () => {
    const { runner, calls } = fakeRunner();
    await executeDot({ dot: dot("bash"), toInstall: true }, runner);
    expect(calls).toEqual(["/dotfiles/bash/setup.sh"]);
  });

  it("never runs setup after a failed install", async () => {
    const { runner, calls } = fakeRunner(["/dotfiles/starship/install.sh"]);
    const outcome = await executeDot({ dot: dot("starship", { install: true }), toInstall: true }, runner);

    expect(calls).toEqual(["/dotfiles/starship/install.sh"]);
    expect(outcome).toEqual({
      status: "failed",
      stage: "install",
      dot: dot("starship", { install: true }),
      install: { ok: false, script: "/dotfiles/starship/install.sh", reason: "exit", exitCode: 1 },
    });
  });

  it("reports a failed setup", async () => {
    const { runner } = fakeRunner(["/dotfiles/zsh/setup.sh"]);
    const outcome = await executeDot({ dot: dot("zsh"), toInstall: false }, runner);

    expect(outcome.status).toBe("failed");
    expect(outcome).toMatchObject({ stage: "setup" });
  });

  it("skips a dot without a setup script", async () => {
    const { runner, calls } = fakeRunner();
    const outcome = await executeDot({ dot: dot("vim", { setup: false }), toInstall: false }, runner);

    expect(calls).toEqual([]);
    expect(outcome).toEqual({ status: "skipped", dot: dot("vim", { setup: false }), reason: "no-setup-script" });
  });

  it("still installs a dot without a setup script", async () => {
    const { runner, calls } = fakeRunner();
    const outcome = await executeDot(
      { dot: dot("vim", { install: true, setup: false }), toInstall: true },
      runner
    );

    expect(calls).toEqual(["/dotfiles/vim/install.sh"]);
    expect(outcome.status).toBe("skipped");
  });

  it("passes run options to the runner", async () => {
    const seen: unknown[] = [];
    const runner: ScriptRunner = async (script, options) => {
      seen.push(options);
      return { ok: true, script, exitCode: 0 };
    };

    await executeDot({ dot: dot("bash"), toInstall: false }, runner, { timeoutMs: 500 });
    expect(seen).toEqual([{ timeoutMs: 500 }]);
  });
});

describe("executeDots", () => {
  it("splits dots into failed and succeeded, in order", async () => {
    const planned: PlannedDot[] = [
      { dot: dot("bash"), toInstall: false },
      { dot: dot("nvim", { install: true }), toInstall: true },
      { dot: dot("tmux"), toInstall: false },
      { dot: dot("vim", { setup: false }), toInstall: false },
      { dot: dot("zsh"), toInstall: false },
    ];
    const { runner } = fakeRunner(["/dotfiles/nvim/install.sh", "/dotfiles/zsh/setup.sh"]);

    const report = await executeDots(planned, { runner });

    expect(report.failed.map((d) => d.name)).toEqual(["nvim", "zsh"]);
    expect(report.succeeded.map((d) => d.name)).toEqual(["bash", "tmux"]);
    expect(report.outcomes.map((o) => o.status)).toEqual([
      "succeeded",
      "failed",
      "succeeded",
      "skipped",
      "failed",
    ]);
  });

  it("keeps going after a failure", async () => {
    const planned: PlannedDot[] = [
      { dot: dot("a"), toInstall: false },
      { dot: dot("b"), toInstall: false },
    ];
    const { runner, calls } = fakeRunner(["/dotfiles/a/setup.sh"]);

    await executeDots(planned, { runner });
    expect(calls).toEqual(["/dotfiles/a/setup.sh", "/dotfiles/b/setup.sh"]);
  });

  it("reports each outcome as it happens", async () => {
    const seen: string[] = [];
    const { runner } = fakeRunner();

    await executeDots([{ dot: dot("bash"), toInstall: false }], {
      runner,
      onOutcome: (outcome: DotOutcome) => seen.push(`${outcome.dot.name}:${outcome.status}`),
    });

    expect(seen).toEqual(["bash:succeeded"]);
  });

  it("returns empty lists for nothing to do", async () => {
    const report = await executeDots([], { runner: fakeRunner().runner });
    expect(report).toEqual({ outcomes: [], failed: [], succeeded: [] });
  });
});
