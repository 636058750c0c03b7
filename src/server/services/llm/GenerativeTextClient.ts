/**
 * Generative text abstraction consumed by the explanation gateway.
 */

export interface GenerateOptions {
  model: string;
  temperature?: number;
}

export interface GenerativeTextClient {
  /**
   * False when no credential is configured; callers must not call generate
   */
  isConfigured(): boolean;

  /**
   * Generate text for a single prompt.
   * Rejects with a ServiceRateLimitError, ServiceConnectionError or
   * ExternalServiceError describing the failure.
   */
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}
