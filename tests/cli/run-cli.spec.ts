import { Readable } from 'node:stream';

import { describe, expect, it } from '@jest/globals';

import { runCli } from '../../src/cli/main.js';
import type { CliRuntime } from '../../src/cli/runtime.js';
import { claudeEvent, completeClaudeStream, dataLines } from '../helpers/sse-fixtures.js';

const stripAnsi = (text: string): string => text.replace(/\u001b\[[0-9;]*m/g, '');

function createFakeRuntime(files: Record<string, string> = {}): { runtime: CliRuntime; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  const runtime: CliRuntime = {
    writeOut: (text) => out.push(stripAnsi(text)),
    writeErr: (text) => err.push(stripAnsi(text)),
    readText: async (filePath) => {
      const content = files[filePath];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file ${filePath}`);
      }
      return content;
    },
    openStream: (filePath) => Readable.from([files[filePath] ?? ''])
  };
  return { runtime, out, err };
}

const run = (args: string[], runtime: CliRuntime): Promise<number> => runCli(['node', 'dialect-relay', ...args], { runtime });

describe('dialect-relay cli', () => {
  it('prints the version', async () => {
    const { runtime, out } = createFakeRuntime();
    await expect(run(['--version'], runtime)).resolves.toBe(0);
    expect(out).toEqual(['0.4.0\n']);
  });

  it('normalizes a usage object to canonical JSON on stdout', async () => {
    const { runtime, out, err } = createFakeRuntime();
    await expect(run(['usage', '{"prompt_tokens":10,"completion_tokens":5}'], runtime)).resolves.toBe(0);
    expect(out.join('')).toBe(`${JSON.stringify({ inputTokens: 10, outputTokens: 5, totalTokens: 15 }, null, 2)}\n`);
    expect(err).toEqual([]);
  });

  it('fails usage for non-object input', async () => {
    const { runtime, out, err } = createFakeRuntime();
    await expect(run(['usage', '[1]'], runtime)).resolves.toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(['usage must be a JSON object\n']);
  });

  it('reports commander usage errors without exiting the process', async () => {
    const { runtime, err } = createFakeRuntime();
    await expect(run(['usage'], runtime)).resolves.toBe(1);
    expect(err.join('')).toContain("missing required argument 'json'");
  });

  it('verifies a complete stream', async () => {
    const { runtime, out } = createFakeRuntime({ 'capture.sse': completeClaudeStream('Hello', 5) });
    await expect(run(['verify', 'capture.sse'], runtime)).resolves.toBe(0);
    expect(out[0]).toBe('ℹ capture.sse: 6 events, text length 5\n');
    expect(out).toContain('ℹ usage input=12 output=5\n');
    expect(out[out.length - 1]).toBe('✓ stream verified\n');
  });

  it('fails verify on problems unless lenient', async () => {
    const truncated = completeClaudeStream('Hello', 5).replace(claudeEvent('message_stop', { type: 'message_stop' }), '');
    const strict = createFakeRuntime({ 'capture.sse': truncated });
    await expect(run(['verify', 'capture.sse'], strict.runtime)).resolves.toBe(1);
    expect(strict.out).toContain('⚠ missing message_stop event\n');
    expect(strict.err).toEqual(['1 problem(s) found\n']);

    const lenient = createFakeRuntime({ 'capture.sse': truncated });
    await expect(run(['verify', 'capture.sse', '--lenient'], lenient.runtime)).resolves.toBe(0);
    expect(lenient.err).toEqual([]);
  });

  it('compares two captures', async () => {
    const { runtime, out } = createFakeRuntime({ 'proxy.sse': completeClaudeStream('Hello', 5), 'upstream.sse': completeClaudeStream('Hello', 5) });
    await expect(run(['compare', 'proxy.sse', 'upstream.sse'], runtime)).resolves.toBe(0);
    expect(out).toContain('✓ token counts match\n');
    expect(out[out.length - 1]).toBe('✓ text matches\n');
  });

  it('fails compare when the text differs', async () => {
    const { runtime, out, err } = createFakeRuntime({ 'proxy.sse': completeClaudeStream('Hello', 7), 'upstream.sse': completeClaudeStream('Hi', 5) });
    await expect(run(['compare', 'proxy.sse', 'upstream.sse'], runtime)).resolves.toBe(1);
    expect(out).toContain('⚠ token mismatch: input 0, output +2\n');
    expect(err).toEqual(['text differs (proxy 5 chars, upstream 2 chars)\n']);
  });

  it('transcodes a captured OpenAI stream into Claude events', async () => {
    const capture = dataLines([{ choices: [{ delta: { content: 'Hi' } }] }, { choices: [{ delta: {}, finish_reason: 'stop' }] }, '[DONE]']);
    const { runtime, out } = createFakeRuntime({ 'openai.sse': capture });
    await expect(run(['transcode', 'openai.sse', '--from', 'openai'], runtime)).resolves.toBe(0);
    expect(out).toEqual([
      claudeEvent('content_block_start', { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } }),
      claudeEvent('content_block_delta', { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hi' } }),
      claudeEvent('content_block_stop', { type: 'content_block_stop', index: 0 })
    ]);
  });

  it('fails transcode on an upstream error chunk', async () => {
    const { runtime, err } = createFakeRuntime({ 'openai.sse': dataLines([{ error: { message: 'boom' } }]) });
    await expect(run(['transcode', 'openai.sse', '--from', 'openai', '--to', 'gemini'], runtime)).resolves.toBe(1);
    expect(err).toEqual(['✗ stream failed after 0 events: upstream error: {"message":"boom"}\n', 'upstream error: {"message":"boom"}\n']);
  });

  it('rejects unsupported transcode routes', async () => {
    const { runtime, err } = createFakeRuntime();
    await expect(run(['transcode', 'x.sse', '--from', 'azure'], runtime)).resolves.toBe(1);
    expect(err).toEqual(['unsupported route azure -> claude\n']);
  });

  it('reports unexpected errors', async () => {
    const { runtime, err } = createFakeRuntime();
    await expect(run(['verify', 'missing.sse'], runtime)).resolves.toBe(1);
    expect(err).toEqual(['ENOENT: no such file missing.sse\n']);
  });
});
