/**
 * Upstream configuration loader
 * Reads a JSON file holding one upstream or `{ "upstreams": [...] }` and
 * validates it against schemas/upstream-config.schema.json.
 */

import fs from 'fs/promises';
import path from 'path';
import Ajv from 'ajv';

import upstreamConfigSchema from '../../schemas/upstream-config.schema.json';
import { ConfigValidationError } from '../conversion/errors.js';
import { isRecord, readArray, readRecord, readString, type UnknownObject } from '../types/common-types.js';
import { createModuleLogger } from '../utils/logger.js';
import { isServiceType, type RoutingConfig } from './routing-config.js';

const log = createModuleLogger('config-loader');

const ajv = new Ajv({ allErrors: true, strict: false });
const validateUpstreamFile = ajv.compile(upstreamConfigSchema);

function toStringMap(source: UnknownObject | undefined): Record<string, string> | undefined {
  if (!source) return undefined;
  const mapped: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string') {
      mapped[key] = value;
    }
  }
  return mapped;
}

function toRoutingConfig(entry: UnknownObject): RoutingConfig {
  const serviceType = entry.serviceType;
  if (!isServiceType(serviceType)) {
    throw new ConfigValidationError(`unsupported serviceType: ${String(serviceType)}`);
  }
  const baseUrls = readArray(entry, 'baseUrls')?.filter((url): url is string => typeof url === 'string');
  const modelMapping = toStringMap(readRecord(entry, 'modelMapping'));
  const name = readString(entry, 'name');
  const anthropicVersion = readString(entry, 'anthropicVersion');
  return {
    serviceType,
    baseUrl: readString(entry, 'baseUrl') ?? '',
    ...(name !== undefined ? { name } : {}),
    ...(baseUrls && baseUrls.length > 0 ? { baseUrls } : {}),
    ...(modelMapping ? { modelMapping } : {}),
    ...(anthropicVersion !== undefined ? { anthropicVersion } : {})
  };
}

/** Validates an already-parsed document; exposed for callers holding config in memory. */
export function parseUpstreamConfig(document: unknown): RoutingConfig[] {
  if (!validateUpstreamFile(document)) {
    const errors = (validateUpstreamFile.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? ''}`.trim());
    throw new ConfigValidationError(`upstream config validation failed: ${errors.join('; ') || 'invalid document'}`, {
      errors
    });
  }
  if (!isRecord(document)) {
    throw new ConfigValidationError('upstream config must be a JSON object');
  }
  const entries = readArray(document, 'upstreams') ?? [document];
  return entries.filter(isRecord).map(toRoutingConfig);
}

export async function loadUpstreamConfig(filePath: string): Promise<RoutingConfig[]> {
  const abs = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  const raw = await fs.readFile(abs, 'utf-8');
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new ConfigValidationError(`upstream config is not valid JSON: ${abs}`, {
      reason: error instanceof Error ? error.message : String(error)
    });
  }
  const configs = parseUpstreamConfig(document);
  log.debug(`loaded ${configs.length} upstream(s) from ${abs}`);
  return configs;
}
