/**
 * Renderer configuration: defaults and validation.
 */

import { TwinframeError } from "../errors.js";
import type { RendererConfig, ResolvedRendererConfig } from "./types.js";

const DEFAULT_CONFIG: ResolvedRendererConfig = Object.freeze({
  checkRegions: true,
  devMode: false,
  warn: (message: string) => {
    console.warn(message);
  },
  maxPatchesPerCycle: Number.POSITIVE_INFINITY,
  onCycle: undefined,
});

function invalidConfig(detail: string): never {
  throw new TwinframeError("TF_INVALID_CONFIG", detail);
}

function requireBoolean(name: string, v: unknown): boolean {
  if (typeof v !== "boolean") invalidConfig(`${name} must be a boolean`);
  return v;
}

function requirePatchCap(v: number): number {
  if (v === Number.POSITIVE_INFINITY) return v;
  if (!Number.isInteger(v) || v <= 0) {
    invalidConfig("maxPatchesPerCycle must be a positive integer or Infinity");
  }
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveRendererConfig(config: RendererConfig | undefined): ResolvedRendererConfig {
  if (!config) return DEFAULT_CONFIG;
  const checkRegions =
    config.checkRegions === undefined
      ? DEFAULT_CONFIG.checkRegions
      : requireBoolean("checkRegions", config.checkRegions);
  const devMode =
    config.devMode === undefined ? DEFAULT_CONFIG.devMode : requireBoolean("devMode", config.devMode);
  if (config.warn !== undefined && typeof config.warn !== "function") {
    invalidConfig("warn must be a function");
  }
  if (config.onCycle !== undefined && typeof config.onCycle !== "function") {
    invalidConfig("onCycle must be a function");
  }
  const maxPatchesPerCycle =
    config.maxPatchesPerCycle === undefined
      ? DEFAULT_CONFIG.maxPatchesPerCycle
      : requirePatchCap(config.maxPatchesPerCycle);

  return Object.freeze({
    checkRegions,
    devMode,
    warn: config.warn ?? DEFAULT_CONFIG.warn,
    maxPatchesPerCycle,
    onCycle: config.onCycle,
  });
}
