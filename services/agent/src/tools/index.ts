import type { RetryPolicy } from '@palaver/shared';
import { withRetry, type ToolRegistry } from '../tool-registry.js';
import { echoTool } from './echo.js';
import { createCurrentTimeTool, createDateCalcTool, type Clock } from './time.js';

export { echoTool } from './echo.js';
export { calculateDate, createCurrentTimeTool, createDateCalcTool, type Clock } from './time.js';

export interface BuiltinToolOptions {
  /** Applied to the idempotent tools */
  retry: RetryPolicy;
  now?: Clock;
}

export function registerBuiltinTools(registry: ToolRegistry, opts: BuiltinToolOptions): void {
  registry.register(echoTool);
  registry.register(createCurrentTimeTool(opts.now));
  registry.register(withRetry(createDateCalcTool(opts.now), opts.retry));
}
