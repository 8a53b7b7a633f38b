export type ServiceType = 'claude' | 'openai' | 'gemini' | 'responses';

export const SERVICE_TYPES: readonly ServiceType[] = ['claude', 'openai', 'gemini', 'responses'];

/** One upstream as the core sees it. Never mutated here. */
export interface RoutingConfig {
  readonly name?: string;
  readonly serviceType: ServiceType;
  readonly baseUrl: string;
  readonly baseUrls?: readonly string[];
  readonly modelMapping?: Readonly<Record<string, string>>;
  readonly anthropicVersion?: string;
}

export function isServiceType(value: unknown): value is ServiceType {
  return SERVICE_TYPES.some((type) => type === value);
}

/** The explicit `baseUrl` wins; the first failover URL stands in when it is empty. */
export function getEffectiveBaseUrl(config: RoutingConfig): string {
  if (config.baseUrl) {
    return config.baseUrl;
  }
  return config.baseUrls?.[0] ?? '';
}

export function hasModelMapping(config: RoutingConfig): boolean {
  return config.modelMapping !== undefined && Object.keys(config.modelMapping).length > 0;
}

/**
 * Exact mapping first, then a containment match in either direction with the
 * longest source tried first, so `gpt-5.1-codex` beats `codex`.
 */
export function redirectModel(model: string, config: RoutingConfig): string {
  const mapping = config.modelMapping;
  if (!mapping || Object.keys(mapping).length === 0) {
    return model;
  }
  if (Object.hasOwn(mapping, model)) {
    return mapping[model] ?? model;
  }
  const sources = Object.keys(mapping).sort((a, b) => b.length - a.length);
  for (const source of sources) {
    if (model.includes(source) || source.includes(model)) {
      return mapping[source] ?? model;
    }
  }
  return model;
}
