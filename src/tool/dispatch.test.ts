// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { executeToolCalls, toToolCallOutcomes } from './dispatch.js';
import { createToolRegistry } from './registry.js';
import { toolFailure, toolSuccess } from './contract.js';
import type { Tool } from './types.js';

function delayedEchoTool(name: string, delays: Record<string, number>): Tool {
  return {
    definition: {
      name,
      description: 'echoes its input after a delay',
      parameters_schema: { type: 'object', properties: { value: { type: 'string' } }, required: ['value'] },
    },
    execute: async (params) => {
      const value = String(params['value']);
      await new Promise((resolve) => setTimeout(resolve, delays[value] ?? 0));
      return toolSuccess(name, { echoed: value });
    },
  };
}

describe('executeToolCalls', () => {
  it('should return results aligned with calls even when later calls finish first', async () => {
    const registry = createToolRegistry();
    registry.register(delayedEchoTool('echo', { slow: 30, fast: 0 }));

    const executed = await executeToolCalls(registry, [
      { id: 'c1', tool_name: 'echo', parameters: { value: 'slow' } },
      { tool_name: 'echo', parameters: { value: 'fast' } },
    ]);

    expect(executed).toEqual([
      {
        id: 'c1',
        tool_name: 'echo',
        parameters: { value: 'slow' },
        result: { success: true, result: { echoed: 'slow' }, tool_name: 'echo' },
      },
      {
        tool_name: 'echo',
        parameters: { value: 'fast' },
        result: { success: true, result: { echoed: 'fast' }, tool_name: 'echo' },
      },
    ]);
  });

  it('should run the calls of one turn concurrently', async () => {
    const registry = createToolRegistry();
    let inFlight = 0;
    let peak = 0;
    registry.register({
      definition: { name: 'wait', description: 'waits', parameters_schema: { type: 'object', properties: {} } },
      execute: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 10));
        inFlight--;
        return toolSuccess('wait', {});
      },
    });

    await executeToolCalls(registry, [
      { tool_name: 'wait', parameters: {} },
      { tool_name: 'wait', parameters: {} },
      { tool_name: 'wait', parameters: {} },
    ]);

    expect(peak).toBe(3);
  });

  it('should refuse calls outside the allowed set', async () => {
    const registry = createToolRegistry();
    registry.register(delayedEchoTool('echo', {}));

    const executed = await executeToolCalls(
      registry,
      [{ id: 'c9', tool_name: 'echo', parameters: { value: 'x' } }],
      undefined,
      { allowed: new Set(['other']) },
    );

    expect(executed[0]?.result).toEqual({
      success: false,
      error: 'tool not enabled for this request: echo',
      tool_name: 'echo',
    });
  });
});

describe('toToolCallOutcomes', () => {
  it('should carry the id, the whole execution result and an error flag for failures', () => {
    const outcomes = toToolCallOutcomes([
      { id: 'c1', tool_name: 'a', parameters: {}, result: toolSuccess('a', { ok: true }) },
      { tool_name: 'b', parameters: {}, result: toolFailure('b', 'boom') },
    ]);

    expect(outcomes).toEqual([
      { tool_call_id: 'c1', tool_name: 'a', result: { success: true, result: { ok: true }, tool_name: 'a' } },
      { tool_name: 'b', result: { success: false, error: 'boom', tool_name: 'b' }, is_error: true },
    ]);
  });
});
