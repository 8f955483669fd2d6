// Environment lookups shared by the core and the Node scripts. The core also runs in the browser,
// where there is no process object.
export const readEnv = (name: string): string | null => {
  if (typeof process === 'undefined' || !process.env) return null;
  const v = process.env[name];
  return v && v.length > 0 ? v : null;
};

export const envFlag = (name: string): boolean => readEnv(name) === '1';

export const envInt = (name: string, fallback: number): number => {
  const raw = readEnv(name);
  if (raw === null) return fallback;
  const n = raw.startsWith('0x') || raw.startsWith('0X') ? parseInt(raw.slice(2), 16) : parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
};
