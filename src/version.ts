import fs from 'fs';
import path from 'path';

function resolveClientVersion(): string {
  const packageFile = path.resolve(__dirname, '..', 'package.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(packageFile, 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  throw new Error(`Unable to resolve codctl version from ${packageFile}`);
}

export const CLIENT_VERSION = resolveClientVersion();
