/**
 * Secret Provider Interface
 *
 * A provider resolves a logical secret name (e.g. "TOKEN_SECRET",
 * "GITHUB_CLIENT_SECRET") from one source. Providers are chained by
 * SecretResolver and tried in order until one returns a value.
 */
export interface ISecretProvider {
  /**
   * Resolve a logical secret name.
   *
   * @returns the secret, or undefined when this source does not have it
   * @throws only for unexpected failures (permission denied, I/O errors).
   *         "Not found" is never an exception.
   */
  resolve(logicalName: string): Promise<string | undefined>;
}

export function isSecretProvider(value: unknown): value is ISecretProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resolve' in value &&
    typeof value.resolve === 'function'
  );
}
