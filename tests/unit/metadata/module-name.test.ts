import { describe, it, expect } from 'vitest';

import { toModuleName } from '@/metadata/module-name.js';

describe('toModuleName', () => {
  it('should replace a hyphen with an underscore', () => {
    expect(toModuleName('foo-bar')).toBe('foo_bar');
  });

  it('should replace every hyphen', () => {
    expect(toModuleName('remote-storage-api-client')).toBe('remote_storage_api_client');
  });

  it('should leave names without hyphens unchanged', () => {
    expect(toModuleName('storage_api')).toBe('storage_api');
  });

  it('should keep consecutive hyphens as consecutive underscores', () => {
    expect(toModuleName('a--b')).toBe('a__b');
  });
});
