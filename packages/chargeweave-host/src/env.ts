function readEnv(name: string, env: NodeJS.ProcessEnv): string | undefined {
  const raw = env[name];
  return typeof raw === "string" && raw.trim().length > 0 ? raw.trim() : undefined;
}

export function envInt(name: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const raw = readEnv(name, env);
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isSafeInteger(n)) throw new Error(`${name}: invalid integer value: ${raw}`);
  return n;
}

export function envFloat(name: string, env: NodeJS.ProcessEnv = process.env): number | undefined {
  const raw = readEnv(name, env);
  if (!raw) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`${name}: invalid number: ${raw}`);
  return n;
}
