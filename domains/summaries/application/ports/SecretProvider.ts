/**
* Names under which API keys are stored in the secret store
*/
export type SecretName = 'GOOGLE-API-KEY' | 'NOTION-API-KEY';

/**
* Source of API keys for the external services.
*
* Implementations resolve a vault-style secret name to its value and throw
* SecretStoreError when the secret is missing or unusable.
*/
export interface SecretProvider {
  getSecret(name: SecretName): Promise<string>;
}
