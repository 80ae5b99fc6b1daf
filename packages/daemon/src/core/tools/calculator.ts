import { z } from 'zod';
import { defineLocalTool } from './local-tool.js';

export const calculatorTool = defineLocalTool({
    name: 'calculator',
    description: 'Performs basic arithmetic on two numbers. Use it for any calculation instead of doing the math yourself.',
    inputSchema: z.object({
        operation: z.enum(['add', 'subtract', 'multiply', 'divide']).describe('The operation to perform'),
        a: z.number().finite().describe('The first operand'),
        b: z.number().finite().describe('The second operand'),
    }),
    execute: ({ operation, a, b }) => {
        const result = compute(operation, a, b);
        if (!Number.isFinite(result)) throw new Error(`Result of ${operation} is out of range`);
        return result;
    },
});

function compute(operation: 'add' | 'subtract' | 'multiply' | 'divide', a: number, b: number): number {
    switch (operation) {
        case 'add':
            return a + b;
        case 'subtract':
            return a - b;
        case 'multiply':
            return a * b;
        case 'divide':
            if (b === 0) throw new Error('Division by zero');
            return a / b;
    }
}
