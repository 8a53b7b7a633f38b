/**
 * Provider Factory
 *
 * Picks the provider for an (upstream service type, client dialect) pair.
 */

import type { ServiceType } from '../../../config/routing-config.js';
import { ConfigValidationError } from '../../../conversion/errors.js';
import type { ClientDialect, UpstreamProvider } from '../api/provider-types.js';
import { AnthropicHttpProvider } from './anthropic-http-provider.js';
import { GeminiHttpProvider } from './gemini-http-provider.js';
import { OpenAIHttpProvider } from './openai-http-provider.js';
import { ResponsesHttpProvider, type SessionSource } from './responses-http-provider.js';

export interface ProviderFactoryOptions {
  clientDialect?: ClientDialect;
  /** Only consulted for Responses clients. */
  sessions?: SessionSource;
}

export function createProvider(serviceType: ServiceType, options: ProviderFactoryOptions = {}): UpstreamProvider {
  const clientDialect = options.clientDialect ?? 'claude';

  if (clientDialect === 'responses') {
    if (serviceType === 'gemini') {
      throw new ConfigValidationError('responses clients cannot be routed to gemini upstreams', { serviceType });
    }
    return new ResponsesHttpProvider(serviceType, options.sessions);
  }

  switch (serviceType) {
    case 'claude':
      return new AnthropicHttpProvider(clientDialect);
    case 'openai':
      return new OpenAIHttpProvider(clientDialect);
    case 'gemini':
      return new GeminiHttpProvider(clientDialect);
    case 'responses':
      throw new ConfigValidationError(`${clientDialect} clients cannot be routed to responses upstreams`, { serviceType });
  }
}
