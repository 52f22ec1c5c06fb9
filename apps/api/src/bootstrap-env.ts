import { chmod, mkdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

export type BootstrapEnv = {
  dataDir: string;
};

function parseUmask(raw: string | undefined): number | null {
  const v = raw?.trim();
  if (!v) return null;
  let s = v.toLowerCase();
  if (s.startsWith('0o')) s = s.slice(2);
  // Support "77" / "077" / "0077"
  if (!/^[0-7]{1,4}$/.test(s)) return null;
  return Number.parseInt(s, 8);
}

async function tightenModeNoWorldAccess(path: string) {
  try {
    const mode = (await stat(path)).mode & 0o777;
    // Remove "other" (world) perms, leave owner/group unchanged.
    const tightened = mode & 0o770;
    if (tightened !== mode) {
      await chmod(path, tightened);
    }
  } catch {
    // best-effort only
  }
}

/** `APP_DATA_DIR`, or `./data` under the working directory. */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.APP_DATA_DIR?.trim();
  return configured ? resolve(configured) : join(process.cwd(), 'data');
}

export async function ensureBootstrapEnv(): Promise<BootstrapEnv> {
  // The settings file holds the Radarr API key; keep new files owner-only.
  // Can be overridden for special deployments by setting APP_UMASK (octal).
  const desiredUmask = parseUmask(process.env.APP_UMASK) ?? 0o077;
  try {
    process.umask(desiredUmask);
  } catch {
    // ignore on platforms where umask isn't supported
  }

  const dataDir = resolveDataDir();
  process.env.APP_DATA_DIR = dataDir;
  await mkdir(dataDir, { recursive: true });
  await tightenModeNoWorldAccess(dataDir);

  return { dataDir };
}
