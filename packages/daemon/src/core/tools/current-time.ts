import { z } from 'zod';
import { defineLocalTool } from './local-tool.js';

export const currentTimeTool = defineLocalTool({
    name: 'current_time',
    description: 'Returns the current date and time, optionally in a given IANA timezone such as "America/New_York".',
    inputSchema: z.object({
        timezone: z.string().default('UTC').describe('IANA timezone name'),
    }),
    execute: ({ timezone }) => {
        const now = new Date();
        // Intl throws a RangeError for unknown zones; the registry reports it as a tool failure
        const formatted = new Intl.DateTimeFormat('en-US', {
            timeZone: timezone,
            dateStyle: 'full',
            timeStyle: 'long',
        }).format(now);
        return { timezone, iso: now.toISOString(), formatted };
    },
});
