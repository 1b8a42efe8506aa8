import { describe, it, expect } from 'vitest';
import { loadConfig, isEmptyPagePolicy } from '../../src/config/index.js';
import { ConfigError } from '../../src/errors/index.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      output: undefined,
      emptyPage: 'empty',
      verbose: false,
    });
  });

  it('should read every variable', () => {
    expect(
      loadConfig({
        PDF_PAGE_MD_OUTPUT: './out',
        PDF_PAGE_MD_EMPTY_PAGE: 'placeholder',
        PDF_PAGE_MD_VERBOSE: 'true',
      })
    ).toEqual({ output: './out', emptyPage: 'placeholder', verbose: true });
  });

  it('should treat blank variables as unset', () => {
    expect(
      loadConfig({ PDF_PAGE_MD_OUTPUT: '', PDF_PAGE_MD_EMPTY_PAGE: ' ', PDF_PAGE_MD_VERBOSE: '' })
    ).toEqual({ output: undefined, emptyPage: 'empty', verbose: false });
  });

  it('should accept 1 and 0 for verbose', () => {
    expect(loadConfig({ PDF_PAGE_MD_VERBOSE: '1' }).verbose).toBe(true);
    expect(loadConfig({ PDF_PAGE_MD_VERBOSE: '0' }).verbose).toBe(false);
    expect(loadConfig({ PDF_PAGE_MD_VERBOSE: 'TRUE' }).verbose).toBe(true);
  });

  it('should reject an unknown empty page policy', () => {
    expect(() => loadConfig({ PDF_PAGE_MD_EMPTY_PAGE: 'skip' })).toThrow(ConfigError);
    expect(() => loadConfig({ PDF_PAGE_MD_EMPTY_PAGE: 'skip' })).toThrow('PDF_PAGE_MD_EMPTY_PAGE');
  });

  it('should reject an unknown verbose value', () => {
    expect(() => loadConfig({ PDF_PAGE_MD_VERBOSE: 'yes' })).toThrow('PDF_PAGE_MD_VERBOSE');
  });
});

describe('isEmptyPagePolicy', () => {
  it('should accept the known policies only', () => {
    expect(isEmptyPagePolicy('empty')).toBe(true);
    expect(isEmptyPagePolicy('placeholder')).toBe(true);
    expect(isEmptyPagePolicy('skip')).toBe(false);
    expect(isEmptyPagePolicy(undefined)).toBe(false);
  });
});
