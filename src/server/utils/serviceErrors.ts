/**
 * Service Error Types
 *
 * Standardized error types for external service configuration.
 */

/**
 * Error thrown when a service is not properly configured
 */
export class ServiceConfigurationError extends Error {
  constructor(
    public serviceName: string,
    public missingConfig: string[]
  ) {
    super(`${serviceName} not configured. Missing: ${missingConfig.join(', ')}`);
    this.name = 'ServiceConfigurationError';
  }
}

/**
 * Error thrown when configuration names a provider that does not exist
 */
export class UnsupportedProviderError extends Error {
  constructor(
    public capability: string,
    public provider: string,
    public supported: readonly string[]
  ) {
    super(`Unsupported ${capability} provider: '${provider}'. Supported providers: ${supported.join(', ')}`);
    this.name = 'UnsupportedProviderError';
  }
}
