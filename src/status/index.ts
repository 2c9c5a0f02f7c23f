/**
 * HTTP status classification.
 */

/**
 * Coarse outcome category of an HTTP status code.
 */
export enum HttpStatusCategory {
  Informational = 'informational',
  Success = 'success',
  Redirect = 'redirect',
  ClientError = 'clientError',
  NotFound = 'notFound',
  NotAuthorized = 'notAuthorized',
  ServerError = 'serverError',
  Unknown = 'unknown',
}

/**
 * Maps a numeric status code to its category.
 *
 * 401 and 404 are matched before the generic 4xx range.
 */
export function classifyStatus(code: number): HttpStatusCategory {
  if (code >= 100 && code < 200) return HttpStatusCategory.Informational;
  if (code >= 200 && code < 300) return HttpStatusCategory.Success;
  if (code >= 300 && code < 400) return HttpStatusCategory.Redirect;
  if (code === 401) return HttpStatusCategory.NotAuthorized;
  if (code === 404) return HttpStatusCategory.NotFound;
  if (code >= 400 && code < 500) return HttpStatusCategory.ClientError;
  if (code >= 500 && code < 600) return HttpStatusCategory.ServerError;
  return HttpStatusCategory.Unknown;
}

/**
 * True for 2xx codes.
 */
export function isSuccessStatus(code: number): boolean {
  return classifyStatus(code) === HttpStatusCategory.Success;
}
