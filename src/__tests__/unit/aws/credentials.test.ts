import { describe, it, expect } from '@jest/globals';
import {
  createCredentialProvider,
  getCredentials,
  selectCredentialSource,
} from '../../../core/aws/credentials.js';

describe('Credentials', () => {
  describe('selectCredentialSource', () => {
    it('should prefer static keys from the config', async () => {
      const candidate = selectCredentialSource(
        { credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret', profile: 'ignored' } },
        {}
      );

      expect(candidate.source).toBe('config');
      await expect(candidate.provider()).resolves.toEqual({
        accessKeyId: 'test-access-key',
        secretAccessKey: 'test-secret',
        sessionToken: undefined,
      });
    });

    it('should use the config profile next', () => {
      const candidate = selectCredentialSource({ credentials: { profile: 'audit' } }, {});

      expect(candidate).toMatchObject({ source: 'profile', profile: 'audit' });
    });

    it('should use environment keys without config credentials', () => {
      const candidate = selectCredentialSource(
        {},
        { AWS_ACCESS_KEY_ID: 'test-access-key', AWS_SECRET_ACCESS_KEY: 'test-secret' }
      );

      expect(candidate.source).toBe('environment');
    });

    it('should fall back to the default chain', () => {
      const candidate = selectCredentialSource({}, { AWS_PROFILE: 'sandbox' });

      expect(candidate).toMatchObject({ source: 'default-chain', profile: 'sandbox' });
    });
  });

  it('should resolve static credentials', async () => {
    const resolution = await getCredentials({
      credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret', sessionToken: 'test-token' },
    });

    expect(resolution).toEqual({
      credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret', sessionToken: 'test-token' },
      source: 'config',
      profile: undefined,
    });
  });

  it('should resolve only once per provider', async () => {
    const provider = createCredentialProvider({
      credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' },
    });

    const [first, second] = await Promise.all([provider(), provider()]);

    expect(first).toBe(second);
  });
});
