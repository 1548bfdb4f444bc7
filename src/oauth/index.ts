export { FederationBroker, type CallbackParams, type FederationBrokerOptions } from './federation-broker.js';
export { ProviderRegistry, createProviderRegistry } from './provider-registry.js';
export { BaseOAuthProvider } from './providers/base-provider.js';
export { GitHubProvider, GITHUB_DEFAULT_SCOPE } from './providers/github-provider.js';
export { GoogleProvider, GOOGLE_DEFAULT_SCOPE } from './providers/google-provider.js';
export type {
  OAuthClientCredentials,
  OAuthProvider,
  ProviderRequestContext,
} from './providers/types.js';
