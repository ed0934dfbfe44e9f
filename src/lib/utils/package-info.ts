import { readFileSync } from 'fs';

export interface PackageInfo {
  name: string;
  version: string;
}

let cachedPkg: PackageInfo | null = null;

/**
 * Load and cache package.json metadata (best-effort).
 * Tries several relative paths because this file runs both from src/ and dist/.
 */
export function getPackageInfo(): PackageInfo {
  if (cachedPkg) return cachedPkg;

  const defaults: PackageInfo = {
    name: 'acme-dns-hooks',
    version: '0.0.0-dev',
  };

  const candidates = [
    '../../../package.json', // from src/lib/utils/
    '../../../../package.json', // from dist/src/lib/utils/
  ];

  for (const rel of candidates) {
    try {
      const resolved = require.resolve(rel, { paths: [__dirname] });
      const raw = JSON.parse(readFileSync(resolved, 'utf-8')) as {
        name?: string;
        version?: string;
      };
      if (raw.name !== defaults.name) continue;
      cachedPkg = {
        name: defaults.name,
        version: raw.version || defaults.version,
      };
      return cachedPkg;
    } catch {
      // try next
    }
  }

  cachedPkg = defaults;
  return cachedPkg;
}
