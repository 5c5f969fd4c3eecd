import { createInterface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { config } from 'dotenv';
import { FileCheckpointSaver, OpenAILLMProvider, PinoLogger } from '@scholar/adapters';
import { LOGGING_DEFAULTS, RESEARCH_DEFAULTS, type LogLevel } from '@scholar/core';
import type { RunResult } from '@scholar/engine';
import { createResearchAssistant, ResearchStateSchema, type ResearchState } from '@scholar/research';
//
config();
//

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function resolveLogLevel(value: string | undefined): LogLevel {
    return LOG_LEVELS.find((level) => level === value) ?? LOGGING_DEFAULTS.LEVEL;
}

const apiKey = process.env.OPENAI_API_KEY;
if (!apiKey) {
    console.error('OPENAI_API_KEY is not set');
    process.exit(1);
}

const threadId = process.env.SCHOLAR_THREAD_ID ?? RESEARCH_DEFAULTS.THREAD_ID;
const logger = new PinoLogger({
    level: resolveLogLevel(process.env.LOG_LEVEL),
    prettyPrint: LOGGING_DEFAULTS.PRETTY_PRINT,
    name: 'research-cli'
});

let printed = 0;

const assistant = createResearchAssistant({
    llm: new OpenAILLMProvider({
        apiKey,
        model: process.env.SCHOLAR_MODEL ?? 'gpt-4o-mini',
        ...(process.env.OPENAI_BASE_URL ? { baseUrl: process.env.OPENAI_BASE_URL } : {})
    }),
    store: new FileCheckpointSaver<ResearchState>({
        directory: process.env.SCHOLAR_CHECKPOINT_DIR ?? RESEARCH_DEFAULTS.CHECKPOINT_DIR,
        stateSchema: ResearchStateSchema
    }),
    logger,
    hooks: {
        onNodeEnd: ({ state }) => {
            for (const message of state.messages.slice(printed)) {
                if (message.role === 'assistant' && message.content) {
                    console.log(`Assistant: ${message.content}`);
                }
            }
            printed = state.messages.length;
        }
    }
});

const rl = createInterface({ input, output });

async function askApproval(result: Extract<RunResult<ResearchState>, { status: 'suspended' }>): Promise<RunResult<ResearchState>> {
    const request = result.interrupt.value;
    const text = typeof request === 'object' && request !== null && !Array.isArray(request) ? request['message'] : undefined;
    const message = typeof text === 'string' ? text : 'This step requires human approval.';

    console.log(`\nPaused at '${result.interrupt.node}': ${message}`);
    for (;;) {
        const answer = (await rl.question("Type 'approve' to continue or 'reject' to stop: ")).trim().toLowerCase();
        if (answer === 'approve') {
            console.log('Approval granted. Resuming research...');
            return assistant.approve(threadId);
        }
        if (answer === 'reject') {
            console.log('Research rejected.');
            return assistant.reject(threadId);
        }
        console.log("Please type 'approve' or 'reject'");
    }
}

async function settle(start: RunResult<ResearchState>): Promise<void> {
    let result = start;
    while (result.status === 'suspended' && result.interrupt.reason === 'interrupt') {
        result = await askApproval(result);
    }
    if (result.status === 'failed') {
        console.log(`Error occurred after '${result.lastCompletedNode ?? 'start'}': ${result.error.message}`);
    }
}

async function main(): Promise<void> {
    console.log('Research assistant started. Ask me to research any topic.');
    console.log("Type 'quit' to exit.");

    const existing = await assistant.getState(threadId);
    printed = existing?.values.messages.length ?? 0;
    if (existing?.pendingInterrupt?.reason === 'interrupt') {
        console.log(`Thread '${threadId}' is waiting for approval from a previous session.`);
        await settle({
            status: 'suspended',
            threadId,
            state: existing.values,
            interrupt: existing.pendingInterrupt,
            checkpoint: existing
        });
    }

    for (;;) {
        const query = (await rl.question('\nResearcher: ')).trim();
        if (query.toLowerCase() === 'quit') break;
        if (!query) continue;

        await settle(await assistant.ask(threadId, query));
    }

    rl.close();
}

main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Research CLI crashed');
    rl.close();
    process.exitCode = 1;
});
