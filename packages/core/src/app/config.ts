/**
 * packages/core/src/app/config.ts — Application configuration and validation.
 *
 * Unset fields take defaults; set fields are validated and a bad value throws
 * TvError("TV_INVALID_PROPS") naming the field. The resolved config is frozen.
 */

import { TvError } from "../errors.js";
import { KB_ALT_X, KB_CTRL_C, KB_F10, keyFromName } from "../input/keyCodes.js";

export type AppConfig = Readonly<{
  /** Longest wait for input per loop iteration; also the lone-ESC timeout. */
  pollTimeoutMs?: number;
  /** Unclaimed keys that quit the application. Codes or names such as "ctrl+c". */
  quitKeys?: readonly (number | string)[];
  /** Keep row 0 free for a menu bar. */
  reserveMenuRow?: boolean;
  /** Keep the last row free for a status line. */
  reserveStatusRow?: boolean;
}>;

export type ResolvedAppConfig = Readonly<{
  pollTimeoutMs: number;
  quitKeys: readonly number[];
  reserveMenuRow: boolean;
  reserveStatusRow: boolean;
}>;

const DEFAULT_CONFIG: ResolvedAppConfig = Object.freeze({
  pollTimeoutMs: 50,
  quitKeys: Object.freeze([KB_CTRL_C, KB_F10, KB_ALT_X]),
  reserveMenuRow: true,
  reserveStatusRow: true,
});

function invalidProps(detail: string): never {
  throw new TvError("TV_INVALID_PROPS", detail);
}

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidProps(`${name} must be a positive integer`);
  return v;
}

function requireKeys(name: string, keys: readonly (number | string)[]): readonly number[] {
  const out: number[] = [];
  for (const k of keys) {
    if (typeof k === "number") {
      if (!Number.isInteger(k) || k <= 0) invalidProps(`${name} entries must be positive integers`);
      out.push(k);
      continue;
    }
    const code = keyFromName(k);
    if (code === null) invalidProps(`${name}: unknown key name "${k}"`);
    out.push(code);
  }
  return Object.freeze(out);
}

function requireBoolean(name: string, v: unknown): boolean {
  if (typeof v !== "boolean") invalidProps(`${name} must be a boolean`);
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveAppConfig(config: AppConfig | undefined): ResolvedAppConfig {
  if (!config) return DEFAULT_CONFIG;
  return Object.freeze({
    pollTimeoutMs:
      config.pollTimeoutMs === undefined
        ? DEFAULT_CONFIG.pollTimeoutMs
        : requirePositiveInt("pollTimeoutMs", config.pollTimeoutMs),
    quitKeys:
      config.quitKeys === undefined
        ? DEFAULT_CONFIG.quitKeys
        : requireKeys("quitKeys", config.quitKeys),
    reserveMenuRow:
      config.reserveMenuRow === undefined
        ? DEFAULT_CONFIG.reserveMenuRow
        : requireBoolean("reserveMenuRow", config.reserveMenuRow),
    reserveStatusRow:
      config.reserveStatusRow === undefined
        ? DEFAULT_CONFIG.reserveStatusRow
        : requireBoolean("reserveStatusRow", config.reserveStatusRow),
  });
}
