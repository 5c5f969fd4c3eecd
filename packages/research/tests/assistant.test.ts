import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { FileCheckpointSaver } from '@scholar/adapters';
import { NodeInvocationError } from '@scholar/engine';
import {
  createFakeLLMResponse,
  createFakeResearchAssistant,
  createToolCall,
  FakeLLMProvider,
  FAST_RESEARCH_CONFIG,
  MemoryCheckpointSaver,
  TEST_THREAD_ID
} from '@scholar/testing';

import {
  createResearchAssistant,
  createResearchInput,
  defineTool,
  documentLookupTool,
  ResearchStateSchema,
  type ResearchState
} from '../src/index';

const searchTurn = createFakeLLMResponse({
  content: '',
  toolCalls: [createToolCall('web_search', { query: 'climate change trends' }, 'call-search')]
});
const findingsTurn = createFakeLLMResponse({ content: 'Temperatures keep rising.' });
const summaryTurn = createFakeLLMResponse({ content: 'Summary: warming of 1.1°C since pre-industrial times.' });

const approvalTurn = createFakeLLMResponse({
  content: '',
  toolCalls: [
    createToolCall('request_human_approval', { topic: 'election polling' }, 'call-approval'),
    createToolCall('web_search', { query: 'election polling' }, 'call-search')
  ]
});

describe('createResearchInput', () => {
  it('starts a new question with reset flags', () => {
    expect(createResearchInput('tides')).toEqual({
      messages: [{ role: 'human', content: 'tides' }],
      researchQuery: 'tides',
      researchProgress: ['Research started'],
      sourcesFound: [],
      requiresApproval: false,
      approvedByHuman: false,
      summary: null
    });
  });
});

describe('research assistant', () => {
  it('searches, answers and summarizes a question', async () => {
    const { assistant, llm } = createFakeResearchAssistant([searchTurn, findingsTurn, summaryTurn]);

    const result = await assistant.ask(TEST_THREAD_ID, 'climate change trends');

    expect(result.status).toBe('completed');
    expect(result.state.summary).toBe('Summary: warming of 1.1°C since pre-industrial times.');
    expect(result.state.researchProgress).toEqual([
      'Research started',
      'Agent response generated',
      'Executed web_search',
      'Agent response generated',
      'Research summarized'
    ]);
    expect(result.state.sourcesFound).toEqual(['web_search: climate change trends']);
    expect(result.state.messages.map((message) => message.role)).toEqual(['human', 'assistant', 'tool', 'assistant', 'assistant']);
    expect(llm.calls).toBe(3);
    expect(await assistant.getStatus(TEST_THREAD_ID)).toBe('completed');
  });

  it('does not touch the checkpoint after completion', async () => {
    const { assistant } = createFakeResearchAssistant([searchTurn, findingsTurn, summaryTurn]);
    const result = await assistant.ask(TEST_THREAD_ID, 'climate change trends');

    const saved = await assistant.getState(TEST_THREAD_ID);

    expect(saved?.checkpointId).toBe(result.checkpoint?.checkpointId);
    expect(saved?.status).toBe('completed');
    await expect(assistant.approve(TEST_THREAD_ID)).rejects.toThrowError(
      `Cannot resume thread ${TEST_THREAD_ID}: no pending interrupt (status: completed)`
    );
    expect((await assistant.getState(TEST_THREAD_ID))?.checkpointId).toBe(saved?.checkpointId);
  });

  it('suspends for approval and continues once approved', async () => {
    const { assistant } = createFakeResearchAssistant([approvalTurn, findingsTurn, summaryTurn]);

    const suspended = await assistant.ask(TEST_THREAD_ID, 'election polling');

    expect(suspended.status).toBe('suspended');
    if (suspended.status !== 'suspended') return;
    expect(suspended.interrupt).toEqual({
      node: 'approval',
      reason: 'interrupt',
      value: {
        type: 'approval_request',
        topic: 'election polling',
        message: "The topic 'election polling' requires human approval before proceeding with research."
      }
    });
    expect(suspended.state.requiresApproval).toBe(false);

    const resumed = await assistant.approve(TEST_THREAD_ID);

    expect(resumed.status).toBe('completed');
    expect(resumed.state.approvedByHuman).toBe(true);
    expect(resumed.state.requiresApproval).toBe(true);
    expect(resumed.state.researchProgress).toEqual([
      'Research started',
      'Agent response generated',
      'Approval granted',
      'Executed web_search',
      'Agent response generated',
      'Research summarized'
    ]);
    expect(resumed.state.messages[2]).toEqual({
      role: 'tool',
      toolCallId: 'call-approval',
      name: 'request_human_approval',
      content: 'Human approval granted for topic: election polling'
    });
    expect(resumed.state.summary).toBe('Summary: warming of 1.1°C since pre-industrial times.');
  });

  it('records a rejection and skips the other calls', async () => {
    const { assistant } = createFakeResearchAssistant([approvalTurn, findingsTurn, summaryTurn]);
    await assistant.ask(TEST_THREAD_ID, 'election polling');

    const result = await assistant.reject(TEST_THREAD_ID);

    expect(result.status).toBe('completed');
    expect(result.state.approvedByHuman).toBe(false);
    expect(result.state.sourcesFound).toEqual([]);
    expect(result.state.messages.slice(2, 4).map((message) => message.content)).toEqual([
      'Human approval denied for topic: election polling',
      'Tool web_search skipped: human approval denied'
    ]);
  });

  it('closes unanswered calls when a new question replaces a pending approval', async () => {
    const { assistant, logger } = createFakeResearchAssistant([approvalTurn, findingsTurn, summaryTurn]);
    await assistant.ask(TEST_THREAD_ID, 'election polling');

    await assistant.ask(TEST_THREAD_ID, 'ocean tides');

    const saved = await assistant.getState(TEST_THREAD_ID);
    expect(saved?.values.messages.slice(2, 5)).toEqual([
      {
        role: 'tool',
        toolCallId: 'call-approval',
        name: 'request_human_approval',
        content: 'Tool request_human_approval skipped: superseded by a new question'
      },
      {
        role: 'tool',
        toolCallId: 'call-search',
        name: 'web_search',
        content: 'Tool web_search skipped: superseded by a new question'
      },
      { role: 'human', content: 'ocean tides' }
    ]);
    expect(logger.messages('warn')).toContain('Discarding pending interrupt for new run');
  });

  it('reports a failed model call with the last completed node', async () => {
    const assistant = createResearchAssistant({
      llm: {
        complete: async () => {
          throw new Error('model offline');
        }
      },
      store: new MemoryCheckpointSaver<ResearchState>(),
      config: FAST_RESEARCH_CONFIG
    });

    const result = await assistant.ask(TEST_THREAD_ID, 'tides');

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.error).toBeInstanceOf(NodeInvocationError);
    expect(result.error.message).toBe("Node 'agent' failed: model offline");
    expect(result.lastCompletedNode).toBeNull();
    expect(await assistant.getStatus(TEST_THREAD_ID)).toBe('failed');
  });

  it('answers a hanging tool with its timeout and keeps researching', async () => {
    const stalledSearch = defineTool({
      name: 'web_search',
      description: 'Never answers',
      parameters: z.object({ query: z.string() }),
      handler: () => new Promise<string>(() => undefined)
    });
    const assistant = createResearchAssistant({
      llm: new FakeLLMProvider([searchTurn, findingsTurn, summaryTurn]),
      store: new MemoryCheckpointSaver<ResearchState>(),
      tools: [stalledSearch, documentLookupTool],
      config: { ...FAST_RESEARCH_CONFIG, toolTimeoutMs: 50 }
    });

    const result = await assistant.ask(TEST_THREAD_ID, 'climate change trends');

    expect(result.status).toBe('completed');
    expect(result.state.messages[2]).toEqual({
      role: 'tool',
      toolCallId: 'call-search',
      name: 'web_search',
      content: 'Tool web_search failed: Tool web_search timed out after 50ms'
    });
    expect(result.state.researchProgress).toContain('Executed web_search');
  });

  it('builds a new question on the state left by a concurrent approval', async () => {
    const { assistant } = createFakeResearchAssistant([approvalTurn, findingsTurn, summaryTurn, findingsTurn, summaryTurn]);
    await assistant.ask(TEST_THREAD_ID, 'election polling');

    const [approved, next] = await Promise.all([
      assistant.approve(TEST_THREAD_ID),
      assistant.ask(TEST_THREAD_ID, 'ocean tides')
    ]);

    expect(approved.status).toBe('completed');
    expect(next.status).toBe('completed');
    const answers = next.state.messages
      .filter((message) => message.role === 'tool' && message.toolCallId === 'call-approval')
      .map((message) => message.content);
    expect(answers).toEqual(['Human approval granted for topic: election polling']);
    expect(next.state.messages.filter((message) => message.role === 'human').map((message) => message.content)).toEqual([
      'election polling',
      'ocean tides'
    ]);
  });

  it('returns false when cancelling an idle thread', () => {
    const { assistant } = createFakeResearchAssistant([findingsTurn]);
    expect(assistant.cancel(TEST_THREAD_ID)).toBe(false);
  });
});

describe('research assistant with a file store', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'scholar-research-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const createStore = () => new FileCheckpointSaver<ResearchState>({ directory, stateSchema: ResearchStateSchema });

  it('resumes a suspended thread after a restart', async () => {
    const before = createResearchAssistant({
      llm: new FakeLLMProvider([approvalTurn]),
      store: createStore(),
      config: FAST_RESEARCH_CONFIG
    });
    const suspended = await before.ask('restart-thread', 'election polling');
    expect(suspended.status).toBe('suspended');

    const after = createResearchAssistant({
      llm: new FakeLLMProvider([findingsTurn, summaryTurn]),
      store: createStore(),
      config: FAST_RESEARCH_CONFIG
    });
    expect(await after.getStatus('restart-thread')).toBe('suspended');

    const resumed = await after.approve('restart-thread');

    expect(resumed.status).toBe('completed');
    expect(resumed.state.approvedByHuman).toBe(true);
    expect(resumed.state.summary).toBe('Summary: warming of 1.1°C since pre-industrial times.');
    expect((await createStore().get('restart-thread'))?.values).toEqual(resumed.state);
  });
});
