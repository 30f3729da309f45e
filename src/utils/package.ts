import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Same depth from src/utils and dist/utils.
const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

let cachedVersion: string | undefined;

/**
 * Version of the installed Strata CLI, read from its package.json
 */
export function getVersion(): string {
  if (cachedVersion === undefined) {
    const parsed: unknown = JSON.parse(readFileSync(fileURLToPath(PACKAGE_JSON_URL), 'utf8'));
    cachedVersion =
      typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
        ? parsed.version
        : '0.0.0';
  }
  return cachedVersion;
}
