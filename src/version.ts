import { readFileSync } from 'fs';
import path from 'path';

// Get version from package.json
export function getVersion(): string {
  // Walk up to find package.json (handles both src/ and dist/src/)
  let dir = __dirname;
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json');
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
      return '0.0.0';
    } catch {
      dir = path.dirname(dir);
    }
  }
  return '0.0.0';
}
