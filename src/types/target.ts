/**
 * Base URL composition for an API host.
 */

/**
 * Deployment environment a target points at.
 */
export enum AppEnvironment {
  Development = 'development',
  Testing = 'testing',
  Staging = 'staging',
  PreProduction = 'preProduction',
  Production = 'production',
}

/**
 * Parts of an API base URL.
 */
export interface TargetOptions {
  scheme: string;
  /** Host name; leading and trailing slashes are stripped. */
  host: string;
  port?: number;
  /** API path prefix, e.g. `v1` or `/api/v2`. */
  apiPath?: string;
}

/**
 * Builds the absolute base URL for a target.
 *
 * @example
 * ```typescript
 * buildBaseUrl({ scheme: 'https', host: 'api.example.com/', apiPath: 'v1' });
 * // 'https://api.example.com/v1'
 * ```
 */
export function buildBaseUrl(options: TargetOptions): string {
  const host = options.host.replace(/^\/+|\/+$/g, '');
  const path =
    options.apiPath !== undefined && options.apiPath !== ''
      ? `/${options.apiPath.replace(/^\/+/, '')}`
      : '/';
  const port = options.port !== undefined ? `:${options.port}` : '';
  const url = new URL(`${options.scheme}://${host}${port}${path}`);
  return url.toString();
}
