import {
  PlatformApiError,
  PLATFORM_ERROR_CODES,
} from '../../common/errors/platform-api-error';
import { VenueRole } from '../../common/types/venue.type';

/**
 * GET a JSON document with a hard timeout. Failures surface as
 * PlatformApiError tagged with the venue; the body is returned unvalidated.
 */
export async function fetchJson(
  url: string,
  timeoutMs: number,
  venue: VenueRole,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'TimeoutError') {
      throw new PlatformApiError(
        PLATFORM_ERROR_CODES.REQUEST_TIMEOUT,
        `Request to ${venue} venue timed out after ${timeoutMs}ms`,
        venue,
        'warning',
        { url },
      );
    }
    throw new PlatformApiError(
      PLATFORM_ERROR_CODES.HTTP_FAILURE,
      `Request to ${venue} venue failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      venue,
      'warning',
      { url },
    );
  }

  if (!response.ok) {
    throw new PlatformApiError(
      PLATFORM_ERROR_CODES.HTTP_FAILURE,
      `${venue} venue responded HTTP ${response.status}`,
      venue,
      response.status === 429 ? 'warning' : 'error',
      { url, status: response.status },
    );
  }

  try {
    const body: unknown = await response.json();
    return body;
  } catch {
    throw new PlatformApiError(
      PLATFORM_ERROR_CODES.SCHEMA_CHANGE,
      `${venue} venue returned a non-JSON body`,
      venue,
      'error',
      { url },
    );
  }
}
