import { z } from "zod";
import { TransientError } from "../engine/errors.js";
import type { TextGenerator } from "../providers/generate.js";
import type { ControllerConfig } from "../types.js";
import { PromptedController, describeWorkload } from "./base.js";

const PlanSchema = z.object({
  assignments: z
    .array(
      z.object({
        role: z.string(),
        task: z.string().min(1),
      }),
    )
    .min(1),
});

export type Plan = z.infer<typeof PlanSchema>;

const NOT_JSON = Symbol("not-json");

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return NOT_JSON;
  }
}

/**
 * Extract the first JSON object from a text response.
 * Handles markdown code fences and leading/trailing prose.
 */
export function extractJson(text: string): unknown {
  const whole = tryParse(text);
  if (whole !== NOT_JSON) return whole;

  const fenceMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch) {
    const fenced = tryParse(fenceMatch[1].trim());
    if (fenced !== NOT_JSON) return fenced;
  }

  const objMatch = text.match(/\{[\s\S]*\}/);
  if (objMatch) {
    const embedded = tryParse(objMatch[0]);
    if (embedded !== NOT_JSON) return embedded;
  }

  return null;
}

/**
 * Validate a manager's plan against the available worker roles.
 * A malformed plan is retryable: models usually produce a valid one on
 * the next attempt.
 */
export function parsePlan(text: string, workerRoles: readonly string[]): Plan {
  const parsed = PlanSchema.safeParse(extractJson(text));
  if (!parsed.success) {
    throw new TransientError(`Manager returned a malformed plan: ${parsed.error.issues[0]?.message ?? "no JSON found"}`);
  }
  const unknown = parsed.data.assignments.find((a) => !workerRoles.includes(a.role));
  if (unknown) {
    throw new TransientError(`Manager assigned work to unknown role "${unknown.role}"`);
  }
  return parsed.data;
}

/**
 * Hierarchical process: the first agent profile manages. It plans
 * assignments for the other agents, they execute in plan order, and the
 * manager merges their contributions into the article.
 */
export class CrewManagerController extends PromptedController {
  constructor(config: ControllerConfig, generator: TextGenerator) {
    super("crew_manager", config, generator, 2);
  }

  async process(category: string, style: string, signal?: AbortSignal): Promise<string> {
    this.checkWorkload(category, style);
    const [manager, ...workers] = this.config.agents;
    const workload = describeWorkload(category, style);
    const roles = workers.map((w) => w.role);

    const planText = await this.generate(
      manager,
      [
        `Plan the production of ${workload}.`,
        `Available team members: ${roles.join(", ")}.`,
        `Respond with JSON only: {"assignments": [{"role": "<team member>", "task": "<instructions>"}]}`,
      ].join("\n"),
      signal,
    );
    const plan = parsePlan(planText, roles);

    const contributions: string[] = [];
    for (const assignment of plan.assignments) {
      const worker = workers[roles.indexOf(assignment.role)];
      const context =
        contributions.length > 0 ? `\n\nWork so far:\n${contributions.join("\n\n")}` : "";
      const output = await this.generate(worker, `${assignment.task}${context}`, signal);
      contributions.push(`[${assignment.role}]\n${output}`);
    }

    return this.generate(
      manager,
      `Combine the team's contributions into the final text of ${workload}. Return only the article.\n\n${contributions.join("\n\n")}`,
      signal,
    );
  }
}
