import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../error/configError.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';

/** OAuth Server-to-Server credentials used to sign in against IMS and call the platform. */
export interface Credentials {
  /** Client ID, also sent as `x-api-key` */
  readonly clientId: string;
  /** Client secret used for the client-credentials grant */
  readonly clientSecret: string;
  /** IMS organization ID, sent as `x-gw-ims-org-id` */
  readonly orgId: string;
  /** Scopes requested for the access token */
  readonly scopes: readonly string[];
  /** Technical account of the integration, when the file names one */
  readonly technicalAccountId?: string;
}

/** Shape of the JSON file written by the Developer Console "Download JSON" button. */
const credentialsFileSchema = z.object({
  CLIENT_ID: z.string().min(1),
  CLIENT_SECRETS: z.array(z.string().min(1)).nonempty(),
  ORG_ID: z.string().min(1),
  SCOPES: z.array(z.string()),
  TECHNICAL_ACCOUNT_ID: z.string().optional(),
  TECHNICAL_ACCOUNT_EMAIL: z.string().optional(),
});

/**
 * Builds frozen {@link Credentials} from an already parsed credentials document.
 */
export async function parseCredentials(input: unknown, path = '<inline>'): SafeWrapAsync<Error, Credentials> {
  const [errValidate, file] = await validator(input, credentialsFileSchema);
  if (errValidate) {
    return [new ConfigError(`error invalid credentials in ${path}`, path, { cause: errValidate }), null];
  }

  const credentials: Credentials = {
    clientId: file.CLIENT_ID,
    clientSecret: file.CLIENT_SECRETS[0],
    orgId: file.ORG_ID,
    scopes: Object.freeze([...file.SCOPES]),
    ...(file.TECHNICAL_ACCOUNT_ID !== undefined ? { technicalAccountId: file.TECHNICAL_ACCOUNT_ID } : {}),
  };

  return [null, Object.freeze(credentials)];
}

/**
 * Reads a Developer Console credentials file.
 *
 * A missing or unreadable file, malformed JSON, or a missing field all yield a
 * {@link ConfigError} carrying the path.
 * @example
 * const [err, credentials] = await loadCredentials('./config.json');
 */
export async function loadCredentials(path: string): SafeWrapAsync<Error, Credentials> {
  const [errRead, text] = await safeWrapAsync(() => readFile(path, 'utf8'));
  if (errRead) {
    return [new ConfigError(`error reading credentials file ${path}`, path, { cause: errRead }), null];
  }

  const [errParse, parsed] = safeWrap<Error, unknown>(() => JSON.parse(text));
  if (errParse) {
    return [new ConfigError(`error credentials file ${path} is not valid JSON`, path, { cause: errParse }), null];
  }

  return parseCredentials(parsed, path);
}
