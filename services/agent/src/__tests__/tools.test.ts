import { describe, it, expect } from 'vitest';
import { InvalidToolArgumentsError } from '@palaver/shared';
import { ToolRegistry } from '../tool-registry.js';
import { registerBuiltinTools } from '../tools/index.js';

// Tuesday
const NOW = new Date('2024-03-05T14:07:09Z');

function builtins(): ToolRegistry {
  const registry = new ToolRegistry();
  registerBuiltinTools(registry, {
    retry: { maxAttempts: 2, delayMs: 0, backoff: 'fixed' },
    now: () => NOW,
  });
  return registry;
}

describe('built-in tools', () => {
  it('registers echo, current_time and date_calc', () => {
    expect(builtins().names()).toEqual(['echo', 'current_time', 'date_calc']);
  });

  it('echo returns its text', async () => {
    await expect(builtins().invoke('echo', { text: 'hello' })).resolves.toBe('hello');
  });

  describe('current_time', () => {
    it('defaults to UTC', async () => {
      await expect(builtins().invoke('current_time', {})).resolves.toBe('2024-03-05 14:07:09 UTC');
    });

    it('converts to the requested time zone', async () => {
      await expect(builtins().invoke('current_time', { timeZone: 'Asia/Tokyo' })).resolves.toBe(
        '2024-03-05 23:07:09 Asia/Tokyo',
      );
    });

    it('rejects an unknown time zone', async () => {
      await expect(builtins().invoke('current_time', { timeZone: 'Mars/Olympus' })).rejects.toThrow(
        InvalidToolArgumentsError,
      );
    });
  });

  describe('date_calc', () => {
    it.each([
      [{}, '05/03/2024 (Tuesday)'],
      [{ days: 1 }, '06/03/2024 (Wednesday)'],
      [{ days: -2 }, '03/03/2024 (Sunday)'],
      [{ weeks: -1, format: 'iso' }, '2024-02-27 (Tuesday)'],
      [{ days: 1, weeks: 1 }, '13/03/2024 (Wednesday)'],
      [{ weekday: 0 }, '11/03/2024 (Monday)'],
      [{ weekday: 1 }, '12/03/2024 (Tuesday)'],
      [{ weekday: 4, format: 'iso' }, '2024-03-08 (Friday)'],
      [{ days: 1, weekday: 4 }, '06/03/2024 (Wednesday)'],
      [{ baseDate: '2024-12-31', days: 1, format: 'iso' }, '2025-01-01 (Wednesday)'],
    ])('computes %j', async (args, expected) => {
      await expect(builtins().invoke('date_calc', args)).resolves.toBe(expected);
    });

    it('rejects a weekday outside 0-6', async () => {
      await expect(builtins().invoke('date_calc', { weekday: 7 })).rejects.toThrow(InvalidToolArgumentsError);
    });

    it('rejects a malformed base date', async () => {
      await expect(builtins().invoke('date_calc', { baseDate: '31/12/2024' })).rejects.toThrow(
        "invalid arguments for tool 'date_calc': baseDate: expected YYYY-MM-DD",
      );
    });
  });
});
