import { z } from 'zod';
import { defineTool } from '../tool-registry.js';

export const echoTool = defineTool({
  name: 'echo',
  description: 'Return the given text unchanged. Useful for checking that tool calls work.',
  inputSchema: z.object({
    text: z.string().describe('Text to return'),
  }),
  invoke: async ({ text }) => text,
});
