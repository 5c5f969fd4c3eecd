import { z } from 'zod';
import { defineTool } from './defineTool';

const DOCUMENTS = new Map<string, string>([
    ['DOC-001', 'Internal research on renewable energy shows 40% efficiency gains...'],
    ['DOC-002', 'Market analysis indicates strong growth in AI sector...'],
    ['DOC-003', 'Technical specifications for quantum encryption protocols...']
]);

export const documentLookupTool = defineTool({
    name: 'document_lookup',
    description: 'Look up information from internal documents by id, e.g. DOC-001.',
    parameters: z.object({
        document_id: z.string().min(1)
    }),
    handler: async ({ document_id }) => {
        return DOCUMENTS.get(document_id) ?? `Document ${document_id} not found in database`;
    }
});
