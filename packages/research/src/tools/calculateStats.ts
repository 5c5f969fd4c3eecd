import { z } from 'zod';
import { defineTool } from './defineTool';
import { evaluateExpression } from './calculator';

export const calculateStatsTool = defineTool({
    name: 'calculate_stats',
    description: 'Perform calculations on an arithmetic expression using + - * / % ^ and parentheses.',
    parameters: z.object({
        expression: z.string()
    }),
    handler: async ({ expression }) => {
        try {
            return `Calculation result: ${expression} = ${evaluateExpression(expression)}`;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            return `Error in calculation: ${reason}`;
        }
    }
});
