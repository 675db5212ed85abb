export function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function isVerboseEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.EVIDENCE_VERBOSE);
}

export function isTelemetryDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.EVIDENCE_NO_TELEMETRY);
}

export function readNumericEnv(name: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim().length === 0) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
