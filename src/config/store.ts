import type { GameConfig } from './schema';
import { validateAndRepair } from '@content/validate';

let current: GameConfig = validateAndRepair({});
const subs = new Set<(cfg: GameConfig) => void>();

function notify(cfg: GameConfig) {
  for (const fn of subs) fn(cfg);
}

export function setConfig(cfg: unknown): GameConfig {
  current = validateAndRepair(cfg);
  notify(current);
  return current;
}

export function resetConfig(): GameConfig {
  return setConfig({});
}

export function exportConfig(): string {
  return JSON.stringify(current, null, 2);
}

export function importConfig(json: string): GameConfig {
  const parsed: unknown = JSON.parse(json);
  return setConfig(parsed);
}

export function subscribe(fn: (cfg: GameConfig) => void) {
  subs.add(fn);
  fn(current);
  return () => {
    subs.delete(fn);
  };
}

export const CONFIG = () => current;
