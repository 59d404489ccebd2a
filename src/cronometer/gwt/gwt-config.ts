import type { GwtConfig, GwtConfigOverrides } from '../types/index.js';

// Defaults track the current Cronometer web build and break when it changes
export const DEFAULT_GWT_CONTENT_TYPE = 'text/x-gwt-rpc; charset=UTF-8';
export const DEFAULT_GWT_MODULE_BASE = 'https://cronometer.com/cronometer/';
export const DEFAULT_GWT_PERMUTATION = '7B121DC5483BF272B1BC1916DA9FA963';
export const DEFAULT_GWT_HEADER = '2D6A926E3729946302DC68073CB0D550';

export const ENV_GWT_PERMUTATION = 'CRONOMETER_GWT_PERMUTATION';
export const ENV_GWT_HEADER = 'CRONOMETER_GWT_HEADER';

/**
 * Resolve the GWT configuration once.
 *
 * Each overridable field is taken from the explicit override, then the
 * environment, then the built-in default. Empty strings count as unset.
 */
export function resolveGwtConfig(
  overrides: GwtConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): GwtConfig {
  return Object.freeze({
    contentType: DEFAULT_GWT_CONTENT_TYPE,
    moduleBaseUrl: DEFAULT_GWT_MODULE_BASE,
    permutation: overrides.permutation || env[ENV_GWT_PERMUTATION] || DEFAULT_GWT_PERMUTATION,
    header: overrides.header || env[ENV_GWT_HEADER] || DEFAULT_GWT_HEADER
  });
}
