import path from 'path';
import { ConfigurationError } from '../../src/middleware/errors';
import {
  defaultModelClientFactory,
  LoaderContext,
  loadAriumConfig,
  loadAriumFromFile,
  loadAriumFromYaml,
} from '../../src/services/arium/loader';
import { isPlanAware } from '../../src/services/arium/memory';
import { assistantMessage, messageText } from '../../src/services/arium/messages';
import { Agent } from '../../src/services/arium/nodes/agent';
import { NodeFunction } from '../../src/services/arium/nodes/functionNode';
import { parsePlanText } from '../../src/services/arium/planParser';
import { createPlanTools } from '../../src/services/arium/planTools';
import { ModelConfig, ModelSettings } from '../../src/services/llm/modelClient';
import { createObservability } from '../../src/utils/observability';
import { ScriptedModelClient, ScriptedReply } from '../helpers/scriptedModelClient';

function scripted(replies: ScriptedReply[], extra: LoaderContext = {}) {
  const client = new ScriptedModelClient(replies);
  const models: ModelConfig[] = [];
  const settings: ModelSettings[] = [];
  const context: LoaderContext = {
    createModelClient: (model, modelSettings) => {
      models.push(model);
      settings.push(modelSettings);
      return client;
    },
    observability: createObservability({ silent: true }),
    ...extra,
  };
  return { client, models, settings, context };
}

describe('loadAriumFromFile', () => {
  const functions: Record<string, NodeFunction> = {
    split: (inputs) => messageText(inputs[inputs.length - 1]).split(' ').map((word) => assistantMessage(word)),
    shout: (inputs) => messageText(inputs[0]).toUpperCase(),
    polish: (inputs) => `polished ${messageText(inputs[inputs.length - 1])}`,
  };

  it('compiles nested files, iterators and agent files into one graph', async () => {
    const { client, models, settings, context } = scripted(['summary'], { functions });

    const { arium, metadata } = await loadAriumFromFile(
      path.join(__dirname, '..', 'fixtures', 'pipeline.yaml'),
      context,
    );
    const result = await arium.run(['red green']);

    expect(metadata?.name).toBe('pipeline');
    expect(metadata?.version).toBe('1.0.0');
    expect(arium.nodeNames).toEqual(['summarizer', 'split', 'polish', 'shout_each']);
    expect(result.map((m) => messageText(m))).toEqual([
      'red green',
      'red',
      'green',
      'RED',
      'GREEN',
      'polished GREEN',
      'summary',
    ]);
    expect(result.map((m) => m.source)).toEqual([
      'input',
      'split',
      'split',
      'shout_each',
      'shout_each',
      'polish',
      'summarizer',
    ]);
    expect(result[5].metadata).toEqual({ origin: 'trim' });
    expect(models).toEqual([{ provider: 'openai', name: 'test-model', baseUrl: undefined }]);
    expect(settings).toEqual([{ temperature: 0.2, maxTokens: undefined }]);
    expect(client.calls[0].messages[0].content).toBe(
      'You are a summarizer.\n\nSummarize everything said so far\n\nThink through the problem step by step before giving your final answer.',
    );
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(loadAriumFromFile(path.join(__dirname, 'no-such-file.yaml'))).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });
});

describe('loadAriumFromYaml', () => {
  it('resolves inline agents, pre-supplied agents and functions', async () => {
    const criticClient = new ScriptedModelClient(['critique text']);
    const critic = new Agent({ name: 'critic', systemPrompt: 'Critique the draft', client: criticClient });
    const { client, context } = scripted(['draft text'], {
      agents: { critic },
      functions: { publish: (inputs) => `published ${inputs.length}` },
    });

    const { arium } = await loadAriumFromYaml(
      `
metadata:
  name: review-flow
arium:
  agents:
    - name: drafter
      job: Draft a note about <topic>
    - name: critic
  function_nodes:
    - name: publish
      function_name: publish
  workflow:
    start: drafter
    edges:
      - from: drafter
        to: [critic]
      - from: critic
        to: [publish]
      - from: publish
        to: [end]
    end: [publish]
`,
      context,
    );

    const result = await arium.run(['Go'], { variables: { topic: 'graphs' } });

    expect(arium.name).toBe('review-flow');
    expect(result.map((m) => messageText(m))).toEqual(['Go', 'draft text', 'critique text', 'published 3']);
    expect(client.calls[0].messages[0].content).toBe('Draft a note about graphs');
    expect(criticClient.calls).toHaveLength(1);
  });

  it('builds reflection routers from their type tag', async () => {
    const { context } = scripted(['m1', 'c1', 'm2', 'f1']);
    const { arium } = await loadAriumFromYaml(
      `
agents:
  - name: main
    job: Do the work
  - name: critic
    job: Criticise the work
  - name: final
    job: Polish the work
routers:
  - name: loop
    type: reflection
    flow_pattern: [main, critic, main, final]
workflow:
  start: main
  edges:
    - from: main
      to: [critic, final]
      router: loop
    - from: critic
      to: [main, final]
      router: loop
  end: [final]
`,
      context,
    );

    const result = await arium.run(['task']);
    expect(result.map((m) => m.source)).toEqual(['input', 'main', 'critic', 'main', 'final']);
    expect(result.map((m) => messageText(m))).toEqual(['task', 'm1', 'c1', 'm2', 'f1']);
  });

  it('gives plan-execute workflows a plan-aware memory', async () => {
    const functions: Record<string, NodeFunction> = {
      plan: (_inputs, _variables, runContext) => {
        const plan = parsePlanText('1. s1: First → worker\n2. s2: Second → worker (depends on: s1)');
        if (runContext && plan && isPlanAware(runContext.memory)) {
          runContext.memory.addPlan(plan);
        }
        return 'planned';
      },
      work: (_inputs, _variables, runContext) => {
        const plan = runContext && isPlanAware(runContext.memory) ? runContext.memory.getCurrentPlan() : null;
        const step = plan?.getReadySteps()[0];
        if (!plan || !step) return 'nothing to do';
        plan.markStep(step.id, 'completed');
        return `did ${step.id}`;
      },
      review: () => 'reviewed',
    };
    const { context } = scripted([], { functions });

    const { arium } = await loadAriumFromYaml(
      `
function_nodes:
  - name: planner
    function_name: plan
  - name: worker
    function_name: work
  - name: reviewer
    function_name: review
routers:
  - name: pe
    type: plan_execute
    settings:
      planner_agent: planner
      executor_agent: worker
      reviewer_agent: reviewer
workflow:
  start: planner
  edges:
    - from: planner
      to: [worker, reviewer]
      router: pe
    - from: worker
      to: [worker, reviewer]
      router: pe
    - from: reviewer
      to: [end]
  end: [reviewer]
`,
      context,
    );

    const result = await arium.run(['task']);
    expect(result.map((m) => messageText(m))).toEqual(['task', 'planned', 'did s1', 'did s2', 'reviewed']);
  });
});

describe('plan tools in loaded workflows', () => {
  it('lets an agent planner store the plan the router follows', async () => {
    const tools = Object.fromEntries(createPlanTools('planner').map((tool) => [tool.name, tool]));
    const planReply: ScriptedReply = {
      toolCalls: [
        {
          id: 'call-1',
          name: 'store_execution_plan',
          arguments: JSON.stringify({ plan_text: 'EXECUTION PLAN: Essay\n1. outline: Outline it → worker' }),
        },
      ],
    };
    const { client, context } = scripted([planReply, 'Plan stored'], {
      tools,
      functions: {
        work: (_inputs, _variables, runContext) => {
          const plan = runContext && isPlanAware(runContext.memory) ? runContext.memory.getCurrentPlan() : null;
          const step = plan?.getReadySteps()[0];
          if (!plan || !step) return 'nothing to do';
          plan.markStep(step.id, 'completed');
          return `did ${step.id}`;
        },
        review: () => 'reviewed',
      },
    });

    const { arium } = await loadAriumFromYaml(
      `
agents:
  - name: planner
    job: Plan the work
    tools: [store_execution_plan]
function_nodes:
  - name: worker
    function_name: work
  - name: reviewer
    function_name: review
routers:
  - name: pe
    type: plan_execute
    planner_agent: planner
    reviewer_agent: reviewer
workflow:
  start: planner
  edges:
    - from: planner
      to: [planner, worker, reviewer]
      router: pe
    - from: worker
      to: [worker, reviewer]
      router: pe
  end: [reviewer]
`,
      context,
    );

    const result = await arium.run(['essay please']);

    expect(result.map((m) => messageText(m))).toEqual(['essay please', 'Plan stored', 'did outline', 'reviewed']);
    expect(client.calls[1].messages[3]).toEqual({
      role: 'tool',
      toolCallId: 'call-1',
      content: 'Stored plan "Essay" with 1 steps.',
    });
  });
});

describe('loadAriumConfig errors', () => {
  const fn: NodeFunction = () => 'ok';

  it('rejects documents that fail the schema', async () => {
    await expect(
      loadAriumConfig({ arium: { function_nodes: [{ name: 'a', function_name: 'a' }], workflow: { start: 'a' } } }),
    ).rejects.toThrow('Invalid arium configuration: arium.workflow.end: Required');
  });

  it('requires a workflow section', async () => {
    await expect(
      loadAriumConfig({ function_nodes: [{ name: 'a', function_name: 'a' }] }, { functions: { a: fn } }),
    ).rejects.toThrow('Arium arium has no workflow section');
  });

  it('names unknown functions with the known ones', async () => {
    await expect(
      loadAriumConfig(
        { function_nodes: [{ name: 'a', function_name: 'missing' }], workflow: { start: 'a', end: ['a'] } },
        { functions: { publish: fn } },
      ),
    ).rejects.toThrow('Function not found: missing. Available: [publish]');
  });

  it('names unknown routers', async () => {
    await expect(
      loadAriumConfig(
        {
          function_nodes: [
            { name: 'a', function_name: 'f' },
            { name: 'b', function_name: 'f' },
          ],
          workflow: { start: 'a', edges: [{ from: 'a', to: ['b'], router: 'nope' }], end: ['b'] },
        },
        { functions: { f: fn } },
      ),
    ).rejects.toThrow('Router not found: nope');
  });

  it('rejects edges to unregistered nodes before running', async () => {
    await expect(
      loadAriumConfig(
        {
          function_nodes: [{ name: 'a', function_name: 'f' }],
          workflow: { start: 'a', edges: [{ from: 'a', to: ['ghost'] }], end: ['a'] },
        },
        { functions: { f: fn } },
      ),
    ).rejects.toThrow('Edge target (from a) not found: ghost. Available: [a]');
  });

  it('rejects duplicate node names across sections', async () => {
    const { context } = scripted([], { functions: { f: fn } });
    await expect(
      loadAriumConfig(
        {
          agents: [{ name: 'x', job: 'Work' }],
          function_nodes: [{ name: 'x', function_name: 'f' }],
          workflow: { start: 'x', end: ['x'] },
        },
        context,
      ),
    ).rejects.toThrow('Duplicate node name: x');
  });

  it('reports agents that cannot be resolved', async () => {
    await expect(
      loadAriumConfig({ agents: [{ name: 'ghost' }], workflow: { start: 'ghost', end: ['ghost'] } }),
    ).rejects.toThrow('Agent not found: ghost');
  });

  it('reports missing tools by agent', async () => {
    const { context } = scripted([]);
    await expect(
      loadAriumConfig(
        { agents: [{ name: 'calc', job: 'Add', tools: ['add'] }], workflow: { start: 'calc', end: ['calc'] } },
        context,
      ),
    ).rejects.toThrow('Tool used by agent calc not found: add');
  });

  it('names the parameter a typed router is missing', async () => {
    await expect(
      loadAriumConfig(
        {
          function_nodes: [{ name: 'a', function_name: 'f' }],
          routers: [{ name: 'r', type: 'task_classifier' }],
          workflow: { start: 'a', end: ['a'] },
        },
        { functions: { f: fn } },
      ),
    ).rejects.toThrow('Router r of type task_classifier needs task_categories');
  });
});

describe('defaultModelClientFactory', () => {
  it('builds OpenAI clients for the configured model', () => {
    expect(defaultModelClientFactory({ provider: 'openai', name: 'gpt-test' }, {}).model).toBe('gpt-test');
  });

  it('rejects other providers', () => {
    expect(() => defaultModelClientFactory({ provider: 'other-llm' }, {})).toThrow(
      'Unsupported model provider: other-llm. Available: [openai]',
    );
  });
});
