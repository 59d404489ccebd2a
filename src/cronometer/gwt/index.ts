export {
  buildGwtHeaders,
  encodeAuthenticate,
  encodeGenerateToken,
  encodeLogout,
  decodeUserId,
  decodeToken
} from './gwt-rpc.js';
export type { GwtHeaders } from './gwt-rpc.js';

export {
  resolveGwtConfig,
  DEFAULT_GWT_CONTENT_TYPE,
  DEFAULT_GWT_MODULE_BASE,
  DEFAULT_GWT_PERMUTATION,
  DEFAULT_GWT_HEADER,
  ENV_GWT_PERMUTATION,
  ENV_GWT_HEADER
} from './gwt-config.js';
