import type { TextGenerator } from "../providers/generate.js";
import type { ControllerConfig } from "../types.js";
import { PromptedController, describeWorkload } from "./base.js";

interface Stage {
  name: string;
  instruction: (workload: string, style: string, previous: string) => string;
}

/** research → outline → draft → polish, each stage feeding the next. */
export const CUSTOM_STAGES: readonly Stage[] = [
  {
    name: "research",
    instruction: (workload) =>
      `Collect research notes for ${workload}: key facts, current developments and angles worth covering. Use bullet points.`,
  },
  {
    name: "outline",
    instruction: (workload, _style, notes) =>
      `Using these research notes, write a titled outline for ${workload}.\n\nResearch notes:\n${notes}`,
  },
  {
    name: "draft",
    instruction: (workload, _style, outline) =>
      `Write the full text of ${workload}, following this outline section by section.\n\nOutline:\n${outline}`,
  },
  {
    name: "polish",
    instruction: (_workload, style, draft) =>
      `Edit this draft for accuracy, flow and a consistent ${style} tone. Return the final article.\n\nDraft:\n${draft}`,
  },
];

/**
 * Hand-built pipeline: one writer persona (the first agent profile)
 * works through fixed stages in order.
 */
export class CustomSequentialController extends PromptedController {
  constructor(config: ControllerConfig, generator: TextGenerator) {
    super("custom_sequential", config, generator, 1);
  }

  async process(category: string, style: string, signal?: AbortSignal): Promise<string> {
    this.checkWorkload(category, style);
    const writer = this.config.agents[0];
    const workload = describeWorkload(category, style);

    let output = "";
    for (const stage of CUSTOM_STAGES) {
      output = await this.generate(writer, stage.instruction(workload, style, output), signal);
    }
    return output;
  }
}

/**
 * Crew-style sequential process: every configured agent performs one
 * task, receiving the previous agent's output as context. The last
 * agent's output is the article.
 */
export class CrewSequentialController extends PromptedController {
  constructor(config: ControllerConfig, generator: TextGenerator) {
    super("crew_sequential", config, generator, 1);
  }

  async process(category: string, style: string, signal?: AbortSignal): Promise<string> {
    this.checkWorkload(category, style);
    const workload = describeWorkload(category, style);
    const agents = this.config.agents;

    let output = "";
    for (let i = 0; i < agents.length; i++) {
      const agent = agents[i];
      const isLast = i === agents.length - 1;
      const context =
        i === 0
          ? "You are starting the work."
          : `Output of the previous task (${agents[i - 1].role}):\n${output}`;
      const ask = isLast
        ? `Produce the final, complete text of ${workload}.`
        : `Contribute your part as the ${agent.role} toward ${workload}.`;
      output = await this.generate(agent, `Task ${i + 1} of ${agents.length}. ${ask}\n\n${context}`, signal);
    }
    return output;
  }
}
