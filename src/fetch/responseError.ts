import { z } from 'zod';
import { ApiError, type ApiErrorDetails } from '../error/apiError.js';
import { AuthError } from '../error/authError.js';
import { NotFoundError } from '../error/notFoundError.js';
import { tryParse } from '../utils/tryParse.js';
import { safeWrapAsync } from '../utils/wrap.js';

/** Error body shapes of the platform (`title`/`detail`) and of IMS (`error`/`error_description`). */
const errorBodySchema = z
  .object({
    title: z.string().optional(),
    detail: z.string().optional(),
    error: z.string().optional(),
    error_description: z.string().optional(),
  })
  .passthrough();

/**
 * Converts a non-2xx response into the matching {@link ApiError} subclass:
 * 401/403 become {@link AuthError}, 404 becomes {@link NotFoundError}.
 * The server's title and detail are carried verbatim.
 */
export async function responseError(response: Response, method: string, path: string): Promise<ApiError> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  const body = errText || !text ? undefined : tryParse(text);

  const details: ApiErrorDetails = { status: response.status, body };
  const parsed = errorBodySchema.safeParse(body);
  if (parsed.success) {
    details.title = parsed.data.title ?? parsed.data.error;
    details.detail = parsed.data.detail ?? parsed.data.error_description;
  } else if (typeof body === 'string') {
    details.detail = body;
  }

  const summary = [details.title, details.detail].filter(Boolean).join(' - ');
  const message = `error ${response.status} in ${method} ${path}${summary ? `: ${summary}` : ''}`;
  const opts = errText ? { cause: errText } : undefined;

  if (response.status === 401 || response.status === 403) {
    return new AuthError(message, details, opts);
  }

  if (response.status === 404) {
    return new NotFoundError(message, details, opts);
  }

  return new ApiError(message, details, opts);
}
