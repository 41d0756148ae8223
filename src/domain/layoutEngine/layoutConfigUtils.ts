import type { LayoutStrategyConfig } from "@/domain/layoutEngine/LayoutTypes";

export function resolveNumberConfig(
  config: LayoutStrategyConfig | undefined,
  key: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = Number(config?.[key]);
  if (!Number.isFinite(raw)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, raw));
}

/** Integer variant of `resolveNumberConfig`; finite values are rounded before clamping. */
export function resolveIntegerConfig(
  config: LayoutStrategyConfig | undefined,
  key: string,
  fallback: number,
  min: number,
  max: number
): number {
  return Math.round(resolveNumberConfig(config, key, fallback, min, max));
}

export function resolveBooleanConfig(config: LayoutStrategyConfig | undefined, key: string, fallback: boolean): boolean {
  const raw = config?.[key];
  if (typeof raw === "boolean") {
    return raw;
  }
  if (raw === "true" || raw === 1) {
    return true;
  }
  if (raw === "false" || raw === 0) {
    return false;
  }
  return fallback;
}
