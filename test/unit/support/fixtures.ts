import { DEFAULT_CONFIG } from '../../../src/config/loader.js';
import type { AdminConfig } from '../../../src/types/config.js';
import { ConfiguredSecretProvider } from '../../../src/secrets/provider.js';

/** Default config with placeholder secrets and the given home paths. */
export function testConfig(home: Partial<AdminConfig['home']> = {}, quota: Partial<AdminConfig['quota']> = {}): AdminConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.directory.bind_password = 'test-secret';
  config.realm.admin_password = 'test-secret';
  config.home = { ...config.home, ...home };
  config.quota = { ...config.quota, ...quota };
  return config;
}

export function testSecrets(): ConfiguredSecretProvider {
  return new ConfiguredSecretProvider({ directory: 'test-secret', realm: 'test-secret' });
}
