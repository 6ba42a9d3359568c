/**
 * Clock and calendar tools. Both take the clock as a parameter so tests can
 * pin "now".
 */
import { z } from 'zod';
import { defineTool, type ToolCapability } from '../tool-registry.js';

export type Clock = () => Date;

const DAY_MS = 86_400_000;

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

/** `YYYY-MM-DD HH:mm:ss` wall-clock time in the given zone */
function formatInZone(date: Date, timeZone: string): string {
  const parts: Record<string, string> = {};
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });
  for (const part of formatter.formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return `${parts.year}-${parts.month}-${parts.day} ${parts.hour}:${parts.minute}:${parts.second}`;
}

const currentTimeInput = z.object({
  timeZone: z
    .string()
    .refine(isTimeZone, { message: 'not a known IANA time zone' })
    .optional()
    .describe('IANA time zone, e.g. Europe/Paris (default: UTC)'),
});

export function createCurrentTimeTool(now: Clock = () => new Date()): ToolCapability<z.infer<typeof currentTimeInput>> {
  return defineTool({
    name: 'current_time',
    description: 'Get the current date and time, optionally in a given time zone.',
    inputSchema: currentTimeInput,
    invoke: async ({ timeZone }) => {
      const zone = timeZone ?? 'UTC';
      return `${formatInZone(now(), zone)} ${zone}`;
    },
  });
}

// ---------------------------------------------------------------------------
// date_calc
// ---------------------------------------------------------------------------

const WEEKDAYS = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

const dateCalcInput = z.object({
  days: z.number().int().default(0).describe('Days to add (negative for the past)'),
  weeks: z.number().int().default(0).describe('Weeks to add (negative for the past)'),
  weekday: z
    .number()
    .int()
    .min(0)
    .max(6)
    .optional()
    .describe('Next occurrence of this weekday, 0 = Monday ... 6 = Sunday. Ignored when days or weeks is set'),
  baseDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
    .refine((s) => !Number.isNaN(Date.parse(`${s}T00:00:00Z`)), { message: 'not a valid date' })
    .optional()
    .describe('Date to count from, YYYY-MM-DD (default: today)'),
  format: z.enum(['iso', 'dd/mm/yyyy']).default('dd/mm/yyyy').describe('Output format'),
});

type DateCalcArgs = z.infer<typeof dateCalcInput>;

/** Monday = 0 */
function mondayIndex(date: Date): number {
  return (date.getUTCDay() + 6) % 7;
}

function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function formatDate(date: Date, format: DateCalcArgs['format']): string {
  const y = pad(date.getUTCFullYear(), 4);
  const m = pad(date.getUTCMonth() + 1);
  const d = pad(date.getUTCDate());
  return format === 'iso' ? `${y}-${m}-${d}` : `${d}/${m}/${y}`;
}

/** Date `days + 7 * weeks` from base, or the next `weekday` strictly after base */
export function calculateDate(base: Date, args: DateCalcArgs): Date {
  const start = startOfDay(base);
  if (args.days !== 0 || args.weeks !== 0) {
    return new Date(start.getTime() + (args.days + args.weeks * 7) * DAY_MS);
  }
  if (args.weekday !== undefined) {
    let ahead = args.weekday - mondayIndex(start);
    if (ahead <= 0) ahead += 7;
    return new Date(start.getTime() + ahead * DAY_MS);
  }
  return start;
}

export function createDateCalcTool(now: Clock = () => new Date()): ToolCapability<DateCalcArgs> {
  return defineTool({
    name: 'date_calc',
    description:
      'Compute a calendar date relative to today (or a base date): an offset in days and weeks, ' +
      'or the next given weekday. Dates are in UTC.',
    inputSchema: dateCalcInput,
    invoke: async (args) => {
      const base = args.baseDate ? new Date(`${args.baseDate}T00:00:00Z`) : now();
      const date = calculateDate(base, args);
      return `${formatDate(date, args.format)} (${WEEKDAYS[mondayIndex(date)]})`;
    },
  });
}
