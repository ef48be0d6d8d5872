import { PermanentError } from "../engine/errors.js";
import type { TextGenerator } from "../providers/generate.js";
import type { AgentProfile, ControllerConfig } from "../types.js";
import type { Controller } from "./types.js";

/** Default sampling temperature for controller calls. */
const DEFAULT_TEMPERATURE = 0.7;

/**
 * System prompt for an agent persona, in the role/goal/backstory shape
 * crew-style frameworks use.
 */
export function agentSystemPrompt(agent: AgentProfile, tools: readonly string[]): string {
  const lines = [
    `You are the ${agent.role}.`,
    `Your goal: ${agent.goal}`,
    `Background: ${agent.backstory}`,
  ];
  if (tools.length > 0) {
    lines.push(`Tools you may reference in your work: ${tools.join(", ")}.`);
  }
  lines.push("Respond with the requested text only, without preamble.");
  return lines.join("\n");
}

export function describeWorkload(category: string, style: string): string {
  return `an article in the "${category}" category, written in a ${style} style`;
}

/**
 * Shared plumbing for the built-in controllers: frozen config, a
 * generator, and a `generate` helper that applies per-controller
 * sampling settings.
 */
export abstract class PromptedController implements Controller {
  readonly config: Readonly<ControllerConfig>;

  constructor(
    readonly type: string,
    config: ControllerConfig,
    private generator: TextGenerator,
    minAgents: number,
  ) {
    if (config.agents.length < minAgents) {
      throw new PermanentError(
        `Controller "${type}" needs at least ${minAgents} agent profile(s), got ${config.agents.length}`,
      );
    }
    this.config = Object.freeze({
      ...config,
      agents: Object.freeze(config.agents.map((a) => Object.freeze({ ...a }))),
      tools: Object.freeze([...config.tools]),
    });
  }

  abstract process(category: string, style: string, signal?: AbortSignal): Promise<string>;

  protected generate(agent: AgentProfile, prompt: string, signal?: AbortSignal): Promise<string> {
    return this.generator({
      model: this.config.model,
      system: agentSystemPrompt(agent, this.config.tools),
      prompt,
      temperature: this.config.temperature ?? DEFAULT_TEMPERATURE,
      maxOutputTokens: this.config.maxOutputTokens,
      signal,
    });
  }

  protected checkWorkload(category: string, style: string): void {
    if (!category.trim() || !style.trim()) {
      throw new PermanentError("Workload needs a non-empty category and style");
    }
  }
}
