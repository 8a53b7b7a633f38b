/**
 * Structural analysis of a captured Claude Messages SSE stream: event
 * inventory, block kinds, concatenated text and final usage. Used to check a
 * relayed stream against the upstream one.
 */

import { isRecord, readNumber, readRecord, readString, type UnknownObject } from '../types/common-types.js';
import { tryParseJson } from '../conversion/shared/jsonish.js';
import { readDataPayload } from '../conversion/streaming/sse-line-reader.js';

export interface UsageSnapshot {
  inputTokens?: number;
  outputTokens?: number;
  cacheCreationInputTokens?: number;
  cacheReadInputTokens?: number;
}

export interface StreamReport {
  eventCount: number;
  eventTypes: string[];
  typeCounts: Record<string, number>;
  blockCounts: Record<string, number>;
  hasMessageStart: boolean;
  hasMessageStop: boolean;
  text: string;
  /** message_start usage overlaid with the last usage-bearing message_delta. */
  finalUsage?: UsageSnapshot;
  problems: string[];
}

export interface StreamComparison {
  textEqual: boolean;
  sequenceEqual: boolean;
  inputTokenDelta?: number;
  outputTokenDelta?: number;
}

const USAGE_FIELDS: ReadonlyArray<[keyof UsageSnapshot, string]> = [
  ['inputTokens', 'input_tokens'],
  ['outputTokens', 'output_tokens'],
  ['cacheCreationInputTokens', 'cache_creation_input_tokens'],
  ['cacheReadInputTokens', 'cache_read_input_tokens']
];

function overlayUsage(base: UsageSnapshot, raw: UnknownObject): UsageSnapshot {
  const merged: UsageSnapshot = { ...base };
  for (const [key, field] of USAGE_FIELDS) {
    const value = readNumber(raw, field);
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function analyzeClaudeStream(captured: string): StreamReport {
  const report: StreamReport = {
    eventCount: 0,
    eventTypes: [],
    typeCounts: {},
    blockCounts: {},
    hasMessageStart: false,
    hasMessageStop: false,
    text: '',
    problems: []
  };
  let startUsage: UsageSnapshot = {};
  let deltaUsage: UnknownObject | undefined;

  for (const line of captured.split(/\r?\n/)) {
    const payload = readDataPayload(line);
    if (payload === undefined || payload === '' || payload === '[DONE]') continue;
    report.eventCount++;
    const event = tryParseJson(payload);
    if (!isRecord(event)) {
      report.problems.push(`unparsable event: ${payload.slice(0, 100)}`);
      continue;
    }
    const type = readString(event, 'type') ?? '(untyped)';
    report.eventTypes.push(type);
    increment(report.typeCounts, type);

    switch (type) {
      case 'message_start': {
        report.hasMessageStart = true;
        const usage = readRecord(readRecord(event, 'message') ?? {}, 'usage');
        if (usage) startUsage = overlayUsage({}, usage);
        break;
      }
      case 'message_stop':
        report.hasMessageStop = true;
        break;
      case 'content_block_start':
        increment(report.blockCounts, readString(readRecord(event, 'content_block') ?? {}, 'type') ?? 'unknown');
        break;
      case 'content_block_delta':
        report.text += readString(readRecord(event, 'delta') ?? {}, 'text') ?? '';
        break;
      case 'message_delta':
        deltaUsage = readRecord(event, 'usage') ?? deltaUsage;
        break;
      default:
        break;
    }
  }

  if (deltaUsage) {
    report.finalUsage = overlayUsage(startUsage, deltaUsage);
  }
  report.problems.push(...findProblems(report));
  return report;
}

function findProblems(report: StreamReport): string[] {
  const problems: string[] = [];
  if (!report.hasMessageStart) problems.push('missing message_start event');
  if (!report.hasMessageStop) problems.push('missing message_stop event');
  const usage = report.finalUsage;
  if (!usage) {
    problems.push('missing final usage');
  } else {
    if (!(usage.inputTokens !== undefined && usage.inputTokens > 0)) {
      problems.push(`input_tokens not positive: ${usage.inputTokens ?? 'absent'}`);
    }
    if (!(usage.outputTokens !== undefined && usage.outputTokens > 0)) {
      problems.push(`output_tokens not positive: ${usage.outputTokens ?? 'absent'}`);
    }
  }
  if (report.text.length === 0) problems.push('empty response text');
  return problems;
}

export function compareReports(proxy: StreamReport, upstream: StreamReport): StreamComparison {
  const comparison: StreamComparison = {
    textEqual: proxy.text === upstream.text,
    sequenceEqual: proxy.eventTypes.join(' ') === upstream.eventTypes.join(' ')
  };
  if (proxy.finalUsage && upstream.finalUsage) {
    comparison.inputTokenDelta = (proxy.finalUsage.inputTokens ?? 0) - (upstream.finalUsage.inputTokens ?? 0);
    comparison.outputTokenDelta = (proxy.finalUsage.outputTokens ?? 0) - (upstream.finalUsage.outputTokens ?? 0);
  }
  return comparison;
}
