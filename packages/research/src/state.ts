import { z } from 'zod';
import { MessageSchema } from '@scholar/core';
import { appendSequence, overwrite, type ChannelMap } from '@scholar/engine';

export const ResearchStateSchema = z.object({
    messages: z.array(MessageSchema),
    researchQuery: z.string(),
    researchProgress: z.array(z.string()),
    sourcesFound: z.array(z.string()),
    requiresApproval: z.boolean(),
    approvedByHuman: z.boolean(),
    summary: z.string().nullable()
});

/**
 * Session state of one research thread. Every checkpoint stores a full copy.
 */
export type ResearchState = z.infer<typeof ResearchStateSchema>;

export const researchChannels: ChannelMap<ResearchState> = {
    messages: appendSequence(),
    researchQuery: overwrite(''),
    researchProgress: appendSequence(),
    sourcesFound: appendSequence(),
    requiresApproval: overwrite(false),
    approvedByHuman: overwrite(false),
    summary: overwrite<string | null>(null)
};
