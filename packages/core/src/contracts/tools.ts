import type { z } from 'zod';
import type { Logger } from '../ports/logger';

export interface ToolContext {
  threadId: string;
  logger?: Logger | undefined;
}

export interface Tool<TParameters extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: TParameters;
  handler(params: z.infer<TParameters>, context: ToolContext): Promise<string>;
}

export type ToolLifecycleResult =
  | { status: 'ok'; result: string }
  | { status: 'recoverable_error'; formatted: string };
