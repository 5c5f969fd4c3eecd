import type { Tool } from '@scholar/core';
import { calculateStatsTool } from './calculateStats';
import { documentLookupTool } from './documentLookup';
import { requestHumanApprovalTool } from './requestHumanApproval';
import { webSearchTool } from './webSearch';

export * from './calculator';
export * from './calculateStats';
export * from './defineTool';
export * from './dispatch';
export * from './documentLookup';
export * from './requestHumanApproval';
export * from './webSearch';

export const researchTools: readonly Tool[] = [
    webSearchTool,
    documentLookupTool,
    calculateStatsTool,
    requestHumanApprovalTool
];
