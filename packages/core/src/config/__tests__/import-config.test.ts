import { describe, it, expect, beforeEach } from 'vitest';
import { getImportConfig, resetImportConfig } from '../import-config';

describe('getImportConfig', () => {
  beforeEach(() => {
    resetImportConfig();
  });

  it('uses defaults for an empty environment', () => {
    expect(getImportConfig({})).toEqual({
      maxInputBytes: 10 * 1024 * 1024,
      textListName: 'Imported List',
      defaultStrategy: 'merge',
      defaultValidateData: true,
    });
  });

  it('reads overrides from the environment', () => {
    const config = getImportConfig({
      IMPORT_MAX_INPUT_BYTES: '2048',
      IMPORT_TEXT_LIST_NAME: '  Pasted  ',
      IMPORT_DEFAULT_STRATEGY: 'append',
      IMPORT_VALIDATE_DATA: 'false',
    });
    expect(config).toEqual({
      maxInputBytes: 2048,
      textListName: 'Pasted',
      defaultStrategy: 'append',
      defaultValidateData: false,
    });
  });

  it('caches the first result until reset', () => {
    const first = getImportConfig({ IMPORT_TEXT_LIST_NAME: 'First' });
    expect(getImportConfig({ IMPORT_TEXT_LIST_NAME: 'Second' })).toBe(first);

    resetImportConfig();
    expect(getImportConfig({ IMPORT_TEXT_LIST_NAME: 'Second' }).textListName).toBe('Second');
  });

  it('rejects an unknown default strategy', () => {
    expect(() => getImportConfig({ IMPORT_DEFAULT_STRATEGY: 'overwrite' })).toThrow('Invalid import configuration');
  });
});
