import { readFileSync } from 'node:fs';

// Read through fs: JSON imports in Node ESM need import attributes.
function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  } catch {
    // running from a bundle without package.json next to it
  }
  return '0.0.0';
}

export const backendVersion = readVersion();
