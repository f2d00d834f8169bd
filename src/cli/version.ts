/**
 * @module cli/version
 */

/** Keep in step with package.json. */
export const VERSION = '1.0.0';

/**
 * Banner printed above the help output.
 */
export function getVersionInfo(): string {
  return `Prospect Address Cleaner v${VERSION}`;
}
