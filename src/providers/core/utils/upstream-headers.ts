/**
 * Default header collaborators: inbound header hygiene, credential placement
 * and the user agents some upstreams gate on.
 */

export type InboundHeaders = Readonly<Record<string, string | readonly string[] | undefined>>;

const HOP_BY_HOP = new Set(['connection', 'keep-alive', 'transfer-encoding', 'upgrade', 'te', 'trailer']);

const DROPPED = new Set([
  'host',
  'content-length',
  'authorization',
  'x-api-key',
  'x-goog-api-key',
  'accept-encoding'
]);

export const CLAUDE_CLI_USER_AGENT = 'claude-cli/1.0.0 (external, cli)';
export const CODEX_CLI_USER_AGENT = 'codex_cli_rs/0.1.0';

function isDropped(name: string): boolean {
  return HOP_BY_HOP.has(name) || DROPPED.has(name) || name.startsWith('proxy-');
}

export function prepareUpstreamHeaders(inbound: InboundHeaders, targetHost: string): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [rawName, value] of Object.entries(inbound)) {
    const name = rawName.toLowerCase();
    if (value === undefined || isDropped(name)) {
      continue;
    }
    headers[name] = typeof value === 'string' ? value : value.join(', ');
  }
  if (targetHost) {
    headers.host = targetHost;
  }
  headers['content-type'] = 'application/json';
  return headers;
}

/** Anthropic console keys travel in x-api-key; everything else is a Bearer token. */
export function setAuthenticationHeader(headers: Record<string, string>, apiKey: string): void {
  delete headers.authorization;
  delete headers['x-api-key'];
  if (!apiKey) {
    return;
  }
  if (apiKey.startsWith('sk-ant-')) {
    headers['x-api-key'] = apiKey;
  } else {
    headers.authorization = `Bearer ${apiKey}`;
  }
}

export function ensureCompatibleUserAgent(headers: Record<string, string>, providerTag: string): void {
  const current = headers['user-agent'] ?? '';
  if (providerTag === 'claude' && !current.startsWith('claude-cli')) {
    headers['user-agent'] = CLAUDE_CLI_USER_AGENT;
  } else if (providerTag === 'codex' && !current.startsWith('codex_cli_rs')) {
    headers['user-agent'] = CODEX_CLI_USER_AGENT;
  }
}
