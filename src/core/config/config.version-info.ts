import fs from 'fs';
import path from 'path';
import { logger } from '../observability/logging';

let packageVersion: string | null | undefined;

export function getPackageVersion(): string | null {
  if (packageVersion !== undefined) {
    return packageVersion;
  }
  try {
    const raw = fs.readFileSync(path.join(__dirname, '..', '..', '..', 'package.json'), 'utf8');
    const parsed: unknown = JSON.parse(raw);
    packageVersion =
      typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string'
        ? parsed.version
        : null;
  } catch (error) {
    logger.warn({ err: error }, 'Could not read package version');
    packageVersion = null;
  }
  return packageVersion;
}

export function loadVersionInfo(): void {
  logger.info(`Version Info: v${getPackageVersion() ?? 'unknown'}`);
}
