import { createStep, ExecutionPlan } from '../../src/services/arium/executionPlan';
import { MessageMemory, PlanAwareMemory } from '../../src/services/arium/memory';
import { formatPlan, parsePlanText } from '../../src/services/arium/planParser';
import { createPlanTools } from '../../src/services/arium/planTools';

const PLAN_TEXT = `EXECUTION PLAN: Build feature
DESCRIPTION: Implement and test
1. design: Sketch the API → architect
2. implement: Write the code -> developer (depends on: design)
3. verify: Run the tests → tester (depends on: design, implement)`;

describe('ExecutionPlan', () => {
  it('offers only steps whose dependencies are completed, in declared order', () => {
    const plan = new ExecutionPlan({
      steps: [
        createStep('s1', 'worker'),
        createStep('s2', 'worker', '', ['s1']),
        createStep('s3', 'helper'),
      ],
    });

    expect(plan.getReadySteps().map((s) => s.id)).toEqual(['s1', 's3']);
    plan.markStep('s1', 'completed', 'ok');
    expect(plan.getReadySteps().map((s) => s.id)).toEqual(['s2', 's3']);
    expect(plan.getStep('s1')?.result).toBe('ok');
  });

  it('is completed only when every step is completed', () => {
    const plan = new ExecutionPlan({ steps: [createStep('a', 'n'), createStep('b', 'n')] });
    plan.markStep('a', 'completed');
    expect(plan.isCompleted()).toBe(false);
    plan.markStep('b', 'completed');
    expect(plan.isCompleted()).toBe(true);
  });

  it('tracks failed steps', () => {
    const plan = new ExecutionPlan({ steps: [createStep('a', 'n')] });
    plan.markStep('a', 'failed');
    expect(plan.hasFailed()).toBe(true);
    expect(plan.getReadySteps()).toEqual([]);
  });

  it('rejects duplicate step ids', () => {
    expect(() => new ExecutionPlan({ steps: [createStep('a', 'n'), createStep('a', 'm')] })).toThrow(
      'Duplicate plan step id: a',
    );
  });

  it('throws when marking an unknown step', () => {
    const plan = new ExecutionPlan({ steps: [createStep('a', 'n')] });
    expect(() => plan.markStep('zzz', 'completed')).toThrow('Plan step not found: zzz');
  });
});

describe('parsePlanText', () => {
  it('reads title, description, steps and dependencies', () => {
    const plan = parsePlanText(PLAN_TEXT, { createdBy: 'planner' });

    expect(plan).not.toBeNull();
    expect(plan?.title).toBe('Build feature');
    expect(plan?.description).toBe('Implement and test');
    expect(plan?.createdBy).toBe('planner');
    expect(plan?.steps.map((s) => [s.id, s.node, s.dependencies])).toEqual([
      ['design', 'architect', []],
      ['implement', 'developer', ['design']],
      ['verify', 'tester', ['design', 'implement']],
    ]);
    expect(plan?.getStep('implement')?.description).toBe('Write the code');
  });

  it('falls back to default title and description', () => {
    const plan = parsePlanText('1. only: Single step → worker');
    expect(plan?.title).toBe('Generated Plan');
    expect(plan?.description).toBe('Execution plan');
  });

  it('returns null when there are no step lines', () => {
    expect(parsePlanText('EXECUTION PLAN: Empty\nNothing to do')).toBeNull();
  });

  it('formats a plan with step status', () => {
    const plan = parsePlanText('EXECUTION PLAN: T\nDESCRIPTION: D\n1. a: First → worker');
    expect(plan).not.toBeNull();
    if (!plan) return;
    plan.markStep('a', 'completed');
    expect(formatPlan(plan)).toBe('EXECUTION PLAN: T\nDESCRIPTION: D\n1. a: First → worker [✓ completed]');
  });
});

describe('createPlanTools', () => {
  const toolNamed = (memory: PlanAwareMemory, name: string) => {
    const tool = createPlanTools('planner', memory).find((t) => t.name === name);
    if (!tool) throw new Error(`missing tool ${name}`);
    return tool;
  };

  it('exposes the three plan tools', () => {
    expect(createPlanTools('planner', new PlanAwareMemory()).map((t) => t.name)).toEqual([
      'store_execution_plan',
      'complete_step',
      'check_plan_status',
    ]);
  });

  it('stores a parsed plan in memory', async () => {
    const memory = new PlanAwareMemory();
    const reply = await toolNamed(memory, 'store_execution_plan').execute({ plan_text: PLAN_TEXT });

    expect(reply).toBe('Stored plan "Build feature" with 3 steps.');
    expect(memory.getCurrentPlan()?.createdBy).toBe('planner');
  });

  it('reports plan text without steps', async () => {
    const memory = new PlanAwareMemory();
    const reply = await toolNamed(memory, 'store_execution_plan').execute({ plan_text: 'nothing' });

    expect(reply).toMatch(/^Error: no steps found/);
    expect(memory.getCurrentPlan()).toBeNull();
  });

  it('completes steps and records results', async () => {
    const memory = new PlanAwareMemory();
    await toolNamed(memory, 'store_execution_plan').execute({ plan_text: PLAN_TEXT });
    const complete = toolNamed(memory, 'complete_step');

    expect(await complete.execute({ step_id: 'design', result: 'API drafted' })).toBe('Step design completed.');
    expect(await complete.execute({ step_id: 'nope' })).toBe('Error: plan has no step "nope".');
    const step = memory.getCurrentPlan()?.getStep('design');
    expect(step?.status).toBe('completed');
    expect(step?.result).toBe('API drafted');
  });

  it('describes the current plan', async () => {
    const memory = new PlanAwareMemory();
    const status = toolNamed(memory, 'check_plan_status');
    expect(await status.execute({})).toBe('No execution plan is stored.');

    await toolNamed(memory, 'store_execution_plan').execute({ plan_text: PLAN_TEXT });
    const text = await status.execute({});
    expect(text.split('\n')[2]).toBe('1. design: Sketch the API → architect [○ pending]');
  });

  it('writes to the memory of the calling run', async () => {
    const fallback = new PlanAwareMemory();
    const runMemory = new PlanAwareMemory();
    const [store] = createPlanTools('planner', fallback);

    await store.execute({ plan_text: PLAN_TEXT }, { memory: runMemory, path: ['planner'] });

    expect(runMemory.getCurrentPlan()?.steps).toHaveLength(3);
    expect(fallback.getCurrentPlan()).toBeNull();
  });

  it('reports when neither the run nor the tools have plan-aware memory', async () => {
    const [store, complete] = createPlanTools('planner');
    const context = { memory: new MessageMemory(), path: ['planner'] };

    expect(await store.execute({ plan_text: PLAN_TEXT }, context)).toBe('Error: no plan-aware memory is available.');
    expect(await complete.execute({ step_id: 'design' })).toBe('Error: no plan-aware memory is available.');
  });
});
