/**
 * Centralized LLM Configuration
 *
 * Standardizes temperature settings across agents and routers.
 */

export interface LLMConfig {
  temperature: number;
  maxTokens?: number;
  topP?: number;
}

export const LLM_CONFIG = {
  /**
   * Deterministic mode: temperature 0.0
   * Use for: JSON formatting, plan generation, structured output
   */
  deterministic: {
    temperature: 0,
    maxTokens: 2000,
  } satisfies LLMConfig,

  /**
   * Routing mode: temperature 0.1
   * Use for: router decisions that must name a single node
   */
  routing: {
    temperature: 0.1,
    maxTokens: 50,
  } satisfies LLMConfig,

  /**
   * Reasoning mode: temperature 0.3
   * Use for: agent work, analysis, critique
   */
  reasoning: {
    temperature: 0.3,
    maxTokens: 2000,
  } satisfies LLMConfig,

  /**
   * Creative mode: temperature 0.7
   * Use for: drafting, brainstorming
   */
  creative: {
    temperature: 0.7,
    maxTokens: 2000,
  } satisfies LLMConfig,
} as const;

export type LLMMode = keyof typeof LLM_CONFIG;

/**
 * Get LLM config by name
 */
export function getLLMConfig(mode: LLMMode): LLMConfig {
  return LLM_CONFIG[mode];
}
