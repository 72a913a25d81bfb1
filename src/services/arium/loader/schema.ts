/**
 * Declarative Arium documents (YAML or plain objects), validated with zod.
 * Keys follow the snake_case of the YAML files.
 */

import { z } from 'zod';

export const ModelSchema = z.object({
  provider: z.string().optional(),
  name: z.string().optional(),
  base_url: z.string().optional(),
});

export const AgentSettingsSchema = z.object({
  temperature: z.number().optional(),
  max_tokens: z.number().int().positive().optional(),
  reasoning_pattern: z.enum(['direct', 'cot', 'react', 'DIRECT', 'COT', 'REACT']).optional(),
  max_tool_rounds: z.number().int().positive().optional(),
});

const AgentBodySchema = z.object({
  name: z.string().min(1),
  role: z.string().optional(),
  job: z.string().optional(),
  prompt: z.string().optional(),
  model: ModelSchema.optional(),
  settings: AgentSettingsSchema.optional(),
  tools: z.array(z.string()).optional(),
  input_filter: z.array(z.string()).optional(),
});

export const AgentEntrySchema = AgentBodySchema.extend({
  /** YAML file with an `agent:` section, relative to the referring document */
  file: z.string().optional(),
});

export const AgentFileSchema = z.object({
  agent: AgentBodySchema,
});

export const FunctionNodeEntrySchema = z.object({
  name: z.string().min(1),
  function_name: z.string().min(1),
  description: z.string().optional(),
  input_filter: z.array(z.string()).optional(),
});

export const TaskCategorySchema = z.object({
  description: z.string(),
  keywords: z.array(z.string()).optional(),
  examples: z.array(z.string()).optional(),
});

export const RouterParamsSchema = z.object({
  routing_options: z.record(z.string()).optional(),
  context_description: z.string().optional(),
  task_categories: z.record(TaskCategorySchema).optional(),
  routing_logic: z.record(z.string()).optional(),
  analysis_depth: z.number().int().positive().optional(),
  flow_pattern: z.array(z.string()).optional(),
  allow_early_exit: z.boolean().optional(),
  planner_agent: z.string().optional(),
  executor_agent: z.string().optional(),
  reviewer_agent: z.string().optional(),
  /** Descriptions of the plan-execute agents; informational */
  agents: z.record(z.string()).optional(),
  temperature: z.number().optional(),
  max_retries: z.number().int().positive().optional(),
  fallback_strategy: z.enum(['first', 'last', 'random']).optional(),
});

export const RouterTypeSchema = z.enum([
  'smart',
  'task_classifier',
  'conversation_analysis',
  'reflection',
  'plan_execute',
]);

export const RouterEntrySchema = RouterParamsSchema.extend({
  name: z.string().min(1),
  type: RouterTypeSchema.optional(),
  model: ModelSchema.optional(),
  settings: RouterParamsSchema.optional(),
});

export const IteratorEntrySchema = z.object({
  name: z.string().min(1),
  execute_node: z.string().min(1),
  memory_policy: z.enum(['isolated', 'shared']).optional(),
  input_filter: z.array(z.string()).optional(),
});

export const EdgeEntrySchema = z.object({
  from: z.string().min(1),
  to: z.array(z.string()).min(1),
  router: z.string().optional(),
});

export const WorkflowSchema = z.object({
  start: z.string().min(1),
  edges: z.array(EdgeEntrySchema).default([]),
  end: z.array(z.string()).min(1),
});

export type ModelEntry = z.infer<typeof ModelSchema>;
export type AgentEntry = z.infer<typeof AgentEntrySchema>;
export type AgentBody = z.infer<typeof AgentBodySchema>;
export type FunctionNodeEntry = z.infer<typeof FunctionNodeEntrySchema>;
export type RouterEntry = z.infer<typeof RouterEntrySchema>;
export type RouterParamsEntry = z.infer<typeof RouterParamsSchema>;
export type IteratorEntry = z.infer<typeof IteratorEntrySchema>;
export type WorkflowEntry = z.infer<typeof WorkflowSchema>;

export interface AriumBody {
  agents?: AgentEntry[];
  function_nodes?: FunctionNodeEntry[];
  routers?: RouterEntry[];
  ariums?: AriumEntry[];
  iterators?: IteratorEntry[];
  workflow?: WorkflowEntry;
}

export interface AriumEntry extends AriumBody {
  name: string;
  /** YAML document holding the sub-graph, relative to the referring file */
  file?: string;
  inherit_variables?: boolean;
}

const AriumBodyShape = {
  agents: z.array(AgentEntrySchema).optional(),
  function_nodes: z.array(FunctionNodeEntrySchema).optional(),
  routers: z.array(RouterEntrySchema).optional(),
  iterators: z.array(IteratorEntrySchema).optional(),
  workflow: WorkflowSchema.optional(),
};

export const AriumEntrySchema: z.ZodType<AriumEntry, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    ...AriumBodyShape,
    name: z.string().min(1),
    file: z.string().optional(),
    inherit_variables: z.boolean().optional(),
    ariums: z.array(AriumEntrySchema).optional(),
  }),
);

export const AriumBodySchema: z.ZodType<AriumBody, z.ZodTypeDef, unknown> = z.object({
  ...AriumBodyShape,
  ariums: z.array(AriumEntrySchema).optional(),
});

export const MetadataSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
  description: z.string().optional(),
});

export type AriumMetadata = z.infer<typeof MetadataSchema>;

export interface AriumDocument {
  metadata?: AriumMetadata;
  body: AriumBody;
}

const WrappedDocumentSchema = z.object({
  metadata: MetadataSchema.optional(),
  arium: AriumBodySchema,
});

const FlatDocumentSchema = z.object({
  metadata: MetadataSchema.optional(),
}).passthrough();

/**
 * Accepts both `{ metadata, arium: {...} }` and the keys at top level.
 */
export function parseAriumDocument(raw: unknown): AriumDocument {
  if (typeof raw === 'object' && raw !== null && 'arium' in raw) {
    const { metadata, arium } = WrappedDocumentSchema.parse(raw);
    return { metadata, body: arium };
  }
  const { metadata } = FlatDocumentSchema.parse(raw);
  return { metadata, body: AriumBodySchema.parse(raw) };
}
