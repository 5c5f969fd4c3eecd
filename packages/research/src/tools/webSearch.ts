import { z } from 'zod';
import { defineTool } from './defineTool';

const SEARCH_RESULTS: ReadonlyArray<[keyword: string, result: string]> = [
    ['climate change', 'Recent studies show global temperatures rising 1.1°C since pre-industrial times...'],
    ['ai research', 'Latest breakthroughs in transformer models and multimodal AI systems...'],
    ['quantum computing', 'Quantum processors with more than 1000 qubits are now in laboratory testing...'],
    ['space exploration', 'The Artemis program is preparing a crewed return to the Moon...']
];

export const webSearchTool = defineTool({
    name: 'web_search',
    description: 'Search the web for information.',
    parameters: z.object({
        query: z.string().min(1)
    }),
    handler: async ({ query }) => {
        const normalized = query.toLowerCase();
        const match = SEARCH_RESULTS.find(([keyword]) => normalized.includes(keyword));
        if (match) {
            return `Search results for '${query}':\n${match[1]}`;
        }
        return `No specific results found for '${query}'. General information available.`;
    }
});
