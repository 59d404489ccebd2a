/**
 * GWT-RPC codec for the Cronometer web app
 *
 * Request bodies are GWT-RPC v7 payloads:
 * `7|0|<string table size>|<module base>|<policy header>|<service>|<method>|<types/values...>|<positional refs>|`
 *
 * The string table size, type signatures and trailing reference integers are
 * fixed per method. They are written out literally; only the module base,
 * policy header, nonce and user id are substituted.
 *
 * Responses are only scanned (not parsed): the framing around the values
 * has changed before without the values themselves moving.
 */

import { CRONOMETER_CONFIG, type GwtConfig } from '../types/index.js';

const SERVICE = 'com.cronometer.shared.rpc.CronometerService';

export interface GwtHeaders {
  'content-type': string;
  'x-gwt-module-base': string;
  'x-gwt-permutation': string;
  [header: string]: string;
}

/**
 * HTTP headers for a GWT-RPC POST
 */
export function buildGwtHeaders(config: GwtConfig): GwtHeaders {
  return {
    'content-type': config.contentType,
    'x-gwt-module-base': config.moduleBaseUrl,
    'x-gwt-permutation': config.permutation
  };
}

/**
 * `authenticate(Integer)`, called right after the form login
 */
export function encodeAuthenticate(config: GwtConfig): string {
  return (
    `7|0|5|${config.moduleBaseUrl}|${config.header}|` +
    `${SERVICE}|authenticate|` +
    'java.lang.Integer/3438268394|1|2|3|4|1|5|5|-300|'
  );
}

/**
 * `generateAuthorizationToken(String nonce, int userId, int seconds, AuthScope scope)`
 */
export function encodeGenerateToken(config: GwtConfig, nonce: string, userId: string): string {
  return (
    `7|0|8|${config.moduleBaseUrl}|${config.header}|` +
    `${SERVICE}|generateAuthorizationToken|` +
    `java.lang.String/2004016611|I|com.cronometer.shared.user.AuthScope/2065601159|${nonce}|` +
    `1|2|3|4|4|5|6|6|7|8|${userId}|${CRONOMETER_CONFIG.exportTokenValiditySeconds}|7|2|`
  );
}

/**
 * `logout(String nonce)`
 */
export function encodeLogout(config: GwtConfig, nonce: string): string {
  return (
    `7|0|6|${config.moduleBaseUrl}|${config.header}|` +
    `${SERVICE}|logout|` +
    `java.lang.String/2004016611|${nonce}|1|2|3|4|1|5|6|`
  );
}

const USER_ID_PATTERN = /OK\[(\d+),/;
const TOKEN_PATTERN = /"([^"]*)"/;

/**
 * User id from an `authenticate` response such as `//OK[12345,2,1,...]`
 */
export function decodeUserId(responseText: string): string | null {
  const match = USER_ID_PATTERN.exec(responseText);
  return match ? match[1] : null;
}

/**
 * Token from a `generateAuthorizationToken` response such as `//OK["abc123"]`.
 * Returns the first quoted run as-is; `""` yields an empty string.
 */
export function decodeToken(responseText: string): string | null {
  const match = TOKEN_PATTERN.exec(responseText);
  return match ? match[1] : null;
}
