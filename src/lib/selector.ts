import type { Config, Dot, PlannedDot } from "../types";

/**
 * Dot name → install flag
 */
export type Selection = ReadonlyMap<string, boolean>;

/**
 * Build the selection for a config. An app listed more than once is
 * selected once, with the flag of its last entry.
 */
export function buildSelection(config: Config): Selection {
  const selection = new Map<string, boolean>();
  for (const app of config.apps) {
    selection.set(app.name, app.toInstall);
  }
  return selection;
}

/**
 * Pair each selected dot with its install flag, keeping discovery order.
 */
export function selectDots(dots: Dot[], selection: Selection): PlannedDot[] {
  const planned: PlannedDot[] = [];
  for (const dot of dots) {
    const toInstall = selection.get(dot.name);
    if (toInstall !== undefined) {
      planned.push({ dot, toInstall });
    }
  }
  return planned;
}

/**
 * Select every dot, used when no config is in play
 */
export function selectAll(dots: Dot[], toInstall: boolean): PlannedDot[] {
  return dots.map((dot) => ({ dot, toInstall }));
}

/**
 * Selected names that no discovered dot answers to
 */
export function unmatchedApps(dots: Dot[], selection: Selection): string[] {
  const names = new Set(dots.map((dot) => dot.name));
  return [...selection.keys()].filter((name) => !names.has(name));
}
