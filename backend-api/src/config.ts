// Settings are read from the environment on every call so tests can change them per case.

const DEFAULT_TIMEOUT_MS = 60_000;

function env(name: string): string {
  return String(process.env[name] ?? '').trim();
}

export function getPersistenceUrl(): string {
  const url = env('PROCMON_PERSISTENCE_URL');
  if (!url) throw new Error('PROCMON_PERSISTENCE_URL is not configured');
  return url;
}

/** Shared engineering password; the persistence service also expects it as `key`. */
export function getEngineeringKey(): string | null {
  return env('PROCMON_ENGINEERING_KEY') || null;
}

export function getSessionSecret(): Uint8Array {
  const secret = env('PROCMON_SESSION_SECRET');
  if (secret.length < 32) {
    throw new Error('PROCMON_SESSION_SECRET is not configured (must be 32+ chars)');
  }
  return new TextEncoder().encode(secret);
}

export function getPersistenceTimeoutMs(): number {
  const raw = Number(env('PROCMON_PERSISTENCE_TIMEOUT_MS'));
  if (!Number.isFinite(raw) || raw <= 0) return DEFAULT_TIMEOUT_MS;
  return Math.floor(raw);
}

export function shouldSendLowerCaseFields(): boolean {
  return env('PROCMON_PERSISTENCE_LOWERCASE_FIELDS').toLowerCase() === 'true';
}

export function getListenAddress(): { host: string; port: number } {
  return {
    port: Number(process.env.PORT ?? 3001),
    // localhost only; a reverse proxy exposes it
    host: process.env.HOST ?? '127.0.0.1',
  };
}
