import { isPlaceholder, type EnvSource } from '@config';
import { SecretStoreError } from '@errors';
import { getLogger } from '@kernel/logger';

import type { SecretName, SecretProvider } from '../application/ports/SecretProvider';

const logger = getLogger('secrets');

/** Environment variable holding each secret */
const SECRET_ENV_VARS: Readonly<Record<SecretName, string>> = {
  'GOOGLE-API-KEY': 'GEMINI_API_KEY',
  'NOTION-API-KEY': 'NOTION_API_KEY',
};

/**
* Secret provider backed by environment variables.
* Keys keep their vault-style names so another store can replace this one.
*/
export class EnvSecretProvider implements SecretProvider {
  constructor(private readonly env: EnvSource = process.env) {}

  async getSecret(name: SecretName): Promise<string> {
    const variable = SECRET_ENV_VARS[name];
    const value = this.env[variable]?.trim();

    if (!value || isPlaceholder(value)) {
      logger.error('Secret not configured', undefined, { secret: name, variable });
      throw new SecretStoreError(`Secret ${name} is not configured. Set ${variable}.`);
    }

    logger.debug('Secret resolved', { secret: name });
    return value;
  }
}
