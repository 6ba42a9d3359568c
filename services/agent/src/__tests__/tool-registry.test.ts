import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import {
  DuplicateToolNameError,
  InvalidToolArgumentsError,
  ToolExecutionError,
  UnknownToolError,
} from '@palaver/shared';
import { ToolRegistry, defineTool, withRetry } from '../tool-registry.js';
import { echoTool } from '../tools/index.js';

const neverSettles = defineTool({
  name: 'slow',
  description: 'Never finishes',
  inputSchema: z.object({}),
  timeoutMs: 20,
  invoke: () => new Promise<string>(() => {}),
});

const failing = defineTool({
  name: 'boom',
  description: 'Always fails',
  inputSchema: z.object({}),
  invoke: async () => {
    throw new Error('disk on fire');
  },
});

describe('ToolRegistry', () => {
  it('refuses a second tool with the same name', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);
    expect(() => registry.register(echoTool)).toThrow(DuplicateToolNameError);
    expect(registry.size).toBe(1);
  });

  it('resolves names in request order without duplicates', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);
    registry.register(failing);

    expect(registry.resolve(['boom', 'echo', 'boom']).map((d) => d.name)).toEqual(['boom', 'echo']);
    expect(registry.names()).toEqual(['echo', 'boom']);
    expect(registry.has('echo')).toBe(true);
    expect(registry.has('upper')).toBe(false);
  });

  it('throws UnknownTool for an unregistered name', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);
    expect(() => registry.resolve(['echo', 'upper'])).toThrow(new UnknownToolError('upper'));
  });

  it('describes tools with a JSON schema of their input', () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);

    expect(registry.definitions(registry.resolve(['echo']))).toEqual([
      {
        name: 'echo',
        description: 'Return the given text unchanged. Useful for checking that tool calls work.',
        input_schema: {
          type: 'object',
          properties: { text: { type: 'string', description: 'Text to return' } },
          required: ['text'],
        },
      },
    ]);
  });

  it('invokes a tool with validated arguments', async () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);
    await expect(registry.invoke('echo', { text: 'ping' })).resolves.toBe('ping');
  });

  it('rejects arguments that do not match the schema', async () => {
    const registry = new ToolRegistry();
    registry.register(echoTool);

    const err = await registry.invoke('echo', { txt: 'ping' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidToolArgumentsError);
    expect(err).toHaveProperty('message', "invalid arguments for tool 'echo': text: Required");
  });

  it('throws UnknownTool when invoking an unregistered name', async () => {
    const registry = new ToolRegistry();
    await expect(registry.invoke('upper', {})).rejects.toThrow(UnknownToolError);
  });

  it('wraps a failing tool in ToolExecutionError', async () => {
    const registry = new ToolRegistry();
    registry.register(failing);

    const err = await registry.invoke('boom', {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolExecutionError);
    expect(err).toHaveProperty('code', 'TOOL_EXECUTION_FAILED');
    expect(err).toHaveProperty('message', "tool 'boom' failed: disk on fire");
  });

  it('gives up on a tool that exceeds its timeout', async () => {
    const registry = new ToolRegistry();
    registry.register(neverSettles);

    const err = await registry.invoke('slow', {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolExecutionError);
    expect(err).toHaveProperty('message', "tool 'slow' failed: timed out after 20ms");
  });

  it('stops waiting when the caller cancels', async () => {
    const registry = new ToolRegistry({ defaultTimeoutMs: 10_000 });
    registry.register({ ...neverSettles, timeoutMs: undefined });
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    const err = await registry.invoke('slow', {}, { signal: controller.signal }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolExecutionError);
    expect(err).toHaveProperty('message', "tool 'slow' failed: stop");
  });
});

describe('withRetry', () => {
  it('retries a failed call up to the policy limit', async () => {
    const invoke = vi.fn<(args: { text: string }) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');
    const registry = new ToolRegistry();
    registry.register(withRetry({ ...echoTool, invoke }, { maxAttempts: 3, delayMs: 0, backoff: 'fixed' }));

    await expect(registry.invoke('echo', { text: 'x' })).resolves.toBe('ok');
    expect(invoke).toHaveBeenCalledTimes(2);
  });

  it('surfaces the last failure once attempts run out', async () => {
    const invoke = vi.fn<(args: { text: string }) => Promise<string>>().mockRejectedValue(new Error('still down'));
    const registry = new ToolRegistry();
    registry.register(withRetry({ ...echoTool, invoke }, { maxAttempts: 2, delayMs: 0, backoff: 'fixed' }));

    await expect(registry.invoke('echo', { text: 'x' })).rejects.toThrow("tool 'echo' failed: still down");
    expect(invoke).toHaveBeenCalledTimes(2);
  });
});
