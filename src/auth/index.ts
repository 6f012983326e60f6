/**
 * Auth entrypoint: credentials loading and IMS token handling.
 * @module
 */
export { type Credentials, loadCredentials, parseCredentials } from './credentials.js';
export { TokenClient, type TokenClientProps, type TokenSource } from './tokenClient.js';
