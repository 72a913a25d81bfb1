/**
 * Compiles declarative Arium documents into runnable graphs. Nested ariums
 * are compiled before the graph that wraps them.
 */

import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { ConfigurationError, errorMessage } from '../../../middleware/errors';
import { Observability } from '../../../utils/observability';
import { ModelClient, ModelConfig, ModelSettings, Tool } from '../../llm/modelClient';
import { OpenAIModelClient } from '../../llm/openaiClient';
import { AriumBuilder } from '../builder';
import { Arium } from '../engine';
import { MemoryFactory, PlanAwareMemory } from '../memory';
import { Agent, ReasoningPattern } from '../nodes/agent';
import { AriumNode } from '../nodes/ariumNode';
import { ForEachNode } from '../nodes/forEachNode';
import { FunctionNode, NodeFunction } from '../nodes/functionNode';
import { createRouter, RouterParams } from '../routers/factory';
import { ExecutableNode, Router } from '../types';
import {
  AgentBody,
  AgentEntry,
  AgentFileSchema,
  AriumBody,
  AriumEntry,
  AriumMetadata,
  ModelEntry,
  parseAriumDocument,
  RouterEntry,
  RouterParamsEntry,
} from './schema';

export type ModelClientFactory = (model: ModelConfig, settings: ModelSettings) => ModelClient;

export interface LoaderContext {
  /** Pre-built agents, preferred over any definition with the same name */
  agents?: Record<string, Agent>;
  tools?: Record<string, Tool>;
  functions?: Record<string, NodeFunction>;
  /** Routers referenced by name from edges or untyped router entries */
  routers?: Record<string, Router>;
  createModelClient?: ModelClientFactory;
  /** Directory that relative `file` references resolve against */
  baseDir?: string;
  observability?: Observability;
  memoryFactory?: MemoryFactory;
}

export const END_SENTINEL = 'end';

export const defaultModelClientFactory: ModelClientFactory = (model, settings) => {
  if (model.provider && model.provider.toLowerCase() !== 'openai') {
    throw new ConfigurationError(`Unsupported model provider: ${model.provider}`, {
      reference: model.provider,
      alternatives: ['openai'],
    });
  }
  return new OpenAIModelClient({
    model: model.name,
    baseUrl: model.baseUrl,
    temperature: typeof settings.temperature === 'number' ? settings.temperature : undefined,
    maxTokens: typeof settings.maxTokens === 'number' ? settings.maxTokens : undefined,
  });
};

function toModelConfig(model: ModelEntry | undefined): ModelConfig {
  return { provider: model?.provider, name: model?.name, baseUrl: model?.base_url };
}

function parseOrThrow<T>(parse: () => T, what: string): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid ${what}: ${issues.join('; ')}`);
    }
    throw error;
  }
}

async function readYamlFile(file: string, baseDir: string): Promise<{ raw: unknown; dir: string }> {
  const fullPath = path.resolve(baseDir, file);
  let text: string;
  try {
    text = await fs.readFile(fullPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${fullPath}: ${errorMessage(error)}`, { reference: file });
  }
  return { raw: parseYaml(text), dir: path.dirname(fullPath) };
}

function missingReference(kind: string, name: string, known: Record<string, unknown> | Map<string, unknown> | undefined): never {
  const alternatives = known instanceof Map ? [...known.keys()] : Object.keys(known ?? {});
  throw new ConfigurationError(`${kind} not found: ${name}`, { reference: name, alternatives });
}

class AriumCompiler {
  private readonly createClient: ModelClientFactory;

  constructor(private readonly context: LoaderContext) {
    this.createClient = context.createModelClient ?? defaultModelClientFactory;
  }

  async compile(body: AriumBody, name: string, baseDir: string): Promise<Arium> {
    const nodes = new Map<string, ExecutableNode>();
    const register = (node: ExecutableNode): void => {
      if (nodes.has(node.name)) {
        throw new ConfigurationError(`Duplicate node name: ${node.name}`, { reference: node.name });
      }
      nodes.set(node.name, node);
    };

    for (const entry of body.agents ?? []) {
      register(await this.resolveAgent(entry, baseDir));
    }

    for (const entry of body.function_nodes ?? []) {
      const fn = this.context.functions?.[entry.function_name];
      if (!fn) missingReference('Function', entry.function_name, this.context.functions);
      register(new FunctionNode({
        name: entry.name,
        fn,
        description: entry.description,
        inputFilter: entry.input_filter,
      }));
    }

    for (const entry of body.ariums ?? []) {
      register(await this.resolveNested(entry, baseDir));
    }

    for (const entry of body.iterators ?? []) {
      const target = nodes.get(entry.execute_node);
      if (!target) missingReference(`Node executed by iterator ${entry.name}`, entry.execute_node, nodes);
      register(new ForEachNode({
        name: entry.name,
        target,
        memoryPolicy: entry.memory_policy,
        inputFilter: entry.input_filter,
        logger: this.context.observability?.logger,
      }));
    }

    const { workflow } = body;
    if (!workflow) {
      throw new ConfigurationError(`Arium ${name} has no workflow section`, { reference: name });
    }

    const routers = new Map<string, Router>();
    for (const entry of body.routers ?? []) {
      routers.set(entry.name, this.buildRouter(entry));
    }
    const usesPlans = (body.routers ?? []).some((entry) => entry.type === 'plan_execute');

    // Nodes that only serve as iterator targets stay out of the graph itself
    const inWorkflow = new Set([
      workflow.start,
      ...workflow.end,
      ...workflow.edges.flatMap((edge) => [edge.from, ...edge.to]),
    ]);
    const iteratorTargets = new Set((body.iterators ?? []).map((entry) => entry.execute_node));
    const graphNodes = [...nodes.values()].filter(
      (node) => inWorkflow.has(node.name) || !iteratorTargets.has(node.name),
    );

    const builder = new AriumBuilder().withName(name).addNodes(graphNodes).startWith(workflow.start);
    if (this.context.observability) {
      builder.withObservability(this.context.observability);
    }
    const memoryFactory = this.context.memoryFactory ?? (usesPlans ? () => new PlanAwareMemory() : undefined);
    if (memoryFactory) {
      builder.withMemory(memoryFactory);
    }

    for (const edge of workflow.edges) {
      const targets = edge.to.filter((to) => to !== END_SENTINEL);
      if (targets.length === 0) continue;
      let router: Router | undefined;
      if (edge.router) {
        router = routers.get(edge.router) ?? this.context.routers?.[edge.router];
        if (!router) {
          missingReference('Router', edge.router, new Map([...routers, ...Object.entries(this.context.routers ?? {})]));
        }
      }
      builder.addEdge(edge.from, targets, router);
    }
    workflow.end.forEach((terminal) => builder.endWith(terminal));

    return builder.build();
  }

  private async resolveAgent(entry: AgentEntry, baseDir: string): Promise<Agent> {
    const supplied = this.context.agents?.[entry.name];
    if (supplied) return supplied;

    let body: AgentBody = entry;
    if (entry.file) {
      const { raw } = await readYamlFile(entry.file, baseDir);
      const { agent } = parseOrThrow(() => AgentFileSchema.parse(raw), `agent file ${entry.file}`);
      body = { ...agent, name: entry.name };
    }

    const systemPrompt = body.job ?? body.prompt;
    if (systemPrompt === undefined) {
      missingReference('Agent', entry.name, this.context.agents);
    }

    const tools = (body.tools ?? []).map((toolName) => {
      const tool = this.context.tools?.[toolName];
      if (!tool) missingReference(`Tool used by agent ${entry.name}`, toolName, this.context.tools);
      return tool;
    });

    const settings = body.settings ?? {};
    const reasoning: ReasoningPattern | undefined =
      settings.reasoning_pattern === undefined
        ? undefined
        : settings.reasoning_pattern === 'COT' || settings.reasoning_pattern === 'cot'
          ? 'cot'
          : settings.reasoning_pattern === 'REACT' || settings.reasoning_pattern === 'react'
            ? 'react'
            : 'direct';

    return new Agent({
      name: entry.name,
      role: body.role,
      systemPrompt,
      client: this.createClient(toModelConfig(body.model), {
        temperature: settings.temperature,
        maxTokens: settings.max_tokens,
      }),
      tools,
      reasoning,
      settings: {
        ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
        ...(settings.max_tokens !== undefined ? { maxTokens: settings.max_tokens } : {}),
      },
      maxToolRounds: settings.max_tool_rounds,
      inputFilter: body.input_filter,
      logger: this.context.observability?.logger,
    });
  }

  private async resolveNested(entry: AriumEntry, baseDir: string): Promise<AriumNode> {
    let body: AriumBody = entry;
    let dir = baseDir;
    if (entry.file) {
      const loaded = await readYamlFile(entry.file, baseDir);
      body = parseOrThrow(() => parseAriumDocument(loaded.raw), `arium file ${entry.file}`).body;
      dir = loaded.dir;
    }

    const arium = await this.compile(body, entry.name, dir);
    return new AriumNode({ name: entry.name, arium, inheritVariables: entry.inherit_variables });
  }

  private buildRouter(entry: RouterEntry): Router {
    if (!entry.type) {
      const supplied = this.context.routers?.[entry.name];
      if (!supplied) missingReference('Router', entry.name, this.context.routers);
      return supplied;
    }

    const top: RouterParamsEntry = entry;
    const pick = <K extends keyof RouterParamsEntry>(key: K): RouterParamsEntry[K] | undefined =>
      top[key] ?? entry.settings?.[key];
    const params = this.routerParams(entry.name, entry.type, pick);

    const needsClient =
      entry.type === 'smart' || entry.type === 'task_classifier' || entry.type === 'conversation_analysis';
    const client =
      needsClient || (entry.type === 'reflection' && entry.model)
        ? this.createClient(toModelConfig(entry.model), { temperature: pick('temperature') })
        : undefined;

    return createRouter(params, { client, logger: this.context.observability?.logger });
  }

  private routerParams(
    name: string,
    type: NonNullable<RouterEntry['type']>,
    pick: <K extends keyof RouterParamsEntry>(key: K) => RouterParamsEntry[K] | undefined,
  ): RouterParams {
    const required = <T>(value: T | undefined, key: string): T => {
      if (value === undefined) {
        throw new ConfigurationError(`Router ${name} of type ${type} needs ${key}`, { reference: name });
      }
      return value;
    };
    const llmParams = {
      temperature: pick('temperature'),
      maxRetries: pick('max_retries'),
      fallbackStrategy: pick('fallback_strategy'),
    };

    switch (type) {
      case 'smart':
        return {
          type,
          routingOptions: required(pick('routing_options'), 'routing_options'),
          contextDescription: pick('context_description'),
          ...llmParams,
        };
      case 'task_classifier':
        return { type, taskCategories: required(pick('task_categories'), 'task_categories'), ...llmParams };
      case 'conversation_analysis':
        return {
          type,
          routingLogic: required(pick('routing_logic'), 'routing_logic'),
          analysisDepth: pick('analysis_depth'),
          ...llmParams,
        };
      case 'reflection':
        return {
          type,
          flowPattern: required(pick('flow_pattern'), 'flow_pattern'),
          allowEarlyExit: pick('allow_early_exit'),
        };
      case 'plan_execute':
        return {
          type,
          plannerNode: required(pick('planner_agent'), 'planner_agent'),
          reviewerNode: required(pick('reviewer_agent'), 'reviewer_agent'),
          executorNode: pick('executor_agent'),
        };
    }
  }
}

export interface LoadedArium {
  arium: Arium;
  metadata?: AriumMetadata;
}

/**
 * Compile an already-parsed document (object form of the YAML).
 */
export async function loadAriumConfig(config: unknown, context: LoaderContext = {}): Promise<LoadedArium> {
  const document = parseOrThrow(() => parseAriumDocument(config), 'arium configuration');
  const compiler = new AriumCompiler(context);
  const arium = await compiler.compile(
    document.body,
    document.metadata?.name ?? 'arium',
    context.baseDir ?? process.cwd(),
  );
  return { arium, metadata: document.metadata };
}

export async function loadAriumFromYaml(text: string, context: LoaderContext = {}): Promise<LoadedArium> {
  return loadAriumConfig(parseYaml(text), context);
}

export async function loadAriumFromFile(file: string, context: LoaderContext = {}): Promise<LoadedArium> {
  const { raw, dir } = await readYamlFile(file, context.baseDir ?? process.cwd());
  return loadAriumConfig(raw, { ...context, baseDir: dir });
}
