import { describe, it, expect } from 'vitest';
import {
  DEFAULT_GWT_CONTENT_TYPE,
  DEFAULT_GWT_HEADER,
  DEFAULT_GWT_MODULE_BASE,
  DEFAULT_GWT_PERMUTATION,
  resolveGwtConfig
} from './gwt-config.js';

describe('resolveGwtConfig', () => {
  it('returns the defaults with no overrides', () => {
    expect(resolveGwtConfig({}, {})).toEqual({
      contentType: DEFAULT_GWT_CONTENT_TYPE,
      moduleBaseUrl: DEFAULT_GWT_MODULE_BASE,
      permutation: DEFAULT_GWT_PERMUTATION,
      header: DEFAULT_GWT_HEADER
    });
  });

  it('returns a frozen config', () => {
    expect(Object.isFrozen(resolveGwtConfig({}, {}))).toBe(true);
  });

  describe('permutation', () => {
    it('takes the environment over the default', () => {
      const config = resolveGwtConfig({}, { CRONOMETER_GWT_PERMUTATION: 'ENV_PERM' });
      expect(config.permutation).toBe('ENV_PERM');
      expect(config.header).toBe(DEFAULT_GWT_HEADER);
    });

    it('takes the explicit value over the environment', () => {
      const config = resolveGwtConfig(
        { permutation: 'PARAM_PERM' },
        { CRONOMETER_GWT_PERMUTATION: 'ENV_PERM' }
      );
      expect(config.permutation).toBe('PARAM_PERM');
    });

    it('treats an empty environment value as unset', () => {
      expect(resolveGwtConfig({}, { CRONOMETER_GWT_PERMUTATION: '' }).permutation).toBe(DEFAULT_GWT_PERMUTATION);
    });
  });

  describe('header', () => {
    it('takes the environment over the default', () => {
      const config = resolveGwtConfig({}, { CRONOMETER_GWT_HEADER: 'ENV_HEAD' });
      expect(config.header).toBe('ENV_HEAD');
      expect(config.permutation).toBe(DEFAULT_GWT_PERMUTATION);
    });

    it('takes the explicit value over the environment', () => {
      const config = resolveGwtConfig({ header: 'PARAM_HEAD' }, { CRONOMETER_GWT_HEADER: 'ENV_HEAD' });
      expect(config.header).toBe('PARAM_HEAD');
    });

    it('treats an empty explicit value as unset', () => {
      const config = resolveGwtConfig({ header: '' }, { CRONOMETER_GWT_HEADER: 'ENV_HEAD' });
      expect(config.header).toBe('ENV_HEAD');
    });
  });
});
