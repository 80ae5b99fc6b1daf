import { z } from 'zod';
import { defineLocalTool } from './local-tool.js';

export const assistantHelperTool = defineLocalTool({
    name: 'assistant_helper',
    description: 'A general helper for everyday work questions that need no external data. Input is the question in plain words.',
    inputSchema: z.object({
        query: z.string().describe('What the user needs help with'),
    }),
    execute: ({ query }) =>
        `I can help you with: ${query}. Let me know if you need specific calculations, the current time, or anything the remote tools provide.`,
});
