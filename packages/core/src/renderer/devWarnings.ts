export type DevWarningArea = "lazy" | "events";

export type DevWarningContext = Readonly<{
  devMode: boolean;
  warned: Set<string>;
  warn: (message: string) => void;
}>;

/** Warn once per key, and only in dev mode. */
export function warnDevIssue(
  ctx: DevWarningContext,
  area: DevWarningArea,
  key: string,
  detail: string,
): void {
  if (!ctx.devMode) return;
  const dedupeKey = `${area}:${key}`;
  if (ctx.warned.has(dedupeKey)) return;
  ctx.warned.add(dedupeKey);
  ctx.warn(`[twinframe][${area}] ${detail}`);
}
