import { readFileSync } from 'node:fs';

/**
 * Service identity (single source of truth)
 *
 * Read from package.json, with env overrides. Resolved relative to this file
 * so it works from src/ (vitest, tsx) and from dist/src/ (node).
 */

interface PackageIdentity {
  name: string;
  version: string;
}

function readPackageIdentity(): PackageIdentity {
  for (const candidate of ['../package.json', '../../package.json']) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(new URL(candidate, import.meta.url), 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null) {
        const name: unknown = Reflect.get(pkg, 'name');
        const version: unknown = Reflect.get(pkg, 'version');
        return {
          name: typeof name === 'string' ? name : 'studio-intent-service',
          version: typeof version === 'string' ? version : '0.0.0',
        };
      }
    } catch {
      continue;
    }
  }
  return { name: 'studio-intent-service', version: '0.0.0' };
}

const identity = readPackageIdentity();

export const SERVICE_NAME = process.env.SERVICE_NAME ?? identity.name;
export const SERVICE_VERSION = process.env.SERVICE_VERSION ?? identity.version;
