import { describe, it, expect, vi } from "vitest";
import { PermanentError, TransientError } from "../engine/errors.js";
import type { GenerationRequest, TextGenerator } from "../providers/generate.js";
import type { AgentProfile, ControllerConfig } from "../types.js";
import { agentSystemPrompt, describeWorkload } from "./base.js";
import { CrewManagerController, extractJson, parsePlan } from "./crew-manager.js";
import { createDefaultRegistry } from "./index.js";
import { CUSTOM_STAGES, CrewSequentialController, CustomSequentialController } from "./sequential.js";

const MANAGER: AgentProfile = { role: "Content Manager", goal: "Ship the article", backstory: "Test manager." };
const RESEARCHER: AgentProfile = { role: "Researcher", goal: "Find facts", backstory: "Test researcher." };
const WRITER: AgentProfile = { role: "Writer", goal: "Write clearly", backstory: "Test writer." };

function config(agents: AgentProfile[], overrides: Partial<ControllerConfig> = {}): ControllerConfig {
  return { model: "test:model", agents, tools: [], ...overrides };
}

/** Generator that answers from a queue and records every request. */
function scripted(replies: string[]): { generator: TextGenerator; requests: GenerationRequest[] } {
  const requests: GenerationRequest[] = [];
  const queue = [...replies];
  const generator: TextGenerator = async (req) => {
    requests.push(req);
    const reply = queue.shift();
    if (reply === undefined) throw new Error("no scripted reply left");
    return reply;
  };
  return { generator, requests };
}

// ── prompts ─────────────────────────────────────────

describe("agentSystemPrompt", () => {
  it("lists role, goal and backstory", () => {
    expect(agentSystemPrompt(WRITER, [])).toBe(
      [
        "You are the Writer.",
        "Your goal: Write clearly",
        "Background: Test writer.",
        "Respond with the requested text only, without preamble.",
      ].join("\n"),
    );
  });

  it("mentions tools when configured", () => {
    expect(agentSystemPrompt(WRITER, ["web_search", "trend_lookup"])).toContain(
      "Tools you may reference in your work: web_search, trend_lookup.",
    );
  });
});

describe("describeWorkload", () => {
  it("names category and style", () => {
    expect(describeWorkload("AI", "tech")).toBe('an article in the "AI" category, written in a tech style');
  });
});

// ── custom_sequential ───────────────────────────────

describe("CustomSequentialController", () => {
  it("runs each stage with the first agent and returns the last output", async () => {
    const { generator, requests } = scripted(["notes", "outline", "draft", "final article"]);
    const controller = new CustomSequentialController(config([WRITER, RESEARCHER], { temperature: 0.3 }), generator);

    const text = await controller.process("AI", "tech");

    expect(text).toBe("final article");
    expect(requests).toHaveLength(CUSTOM_STAGES.length);
    expect(requests.every((r) => r.system.startsWith("You are the Writer."))).toBe(true);
    expect(requests.every((r) => r.temperature === 0.3 && r.model === "test:model")).toBe(true);
    expect(requests[1].prompt).toContain("Research notes:\nnotes");
    expect(requests[2].prompt).toContain("Outline:\noutline");
    expect(requests[3].prompt).toContain("Draft:\ndraft");
    expect(requests[3].prompt).toContain("consistent tech tone");
  });

  it("defaults the temperature to 0.7", async () => {
    const { generator, requests } = scripted(["a", "b", "c", "d"]);
    await new CustomSequentialController(config([WRITER]), generator).process("AI", "tech");
    expect(requests[0].temperature).toBe(0.7);
  });

  it("forwards the abort signal to the generator", async () => {
    const { generator, requests } = scripted(["a", "b", "c", "d"]);
    const ac = new AbortController();
    await new CustomSequentialController(config([WRITER]), generator).process("AI", "tech", ac.signal);
    expect(requests.every((r) => r.signal === ac.signal)).toBe(true);
  });

  it("rejects an empty workload as permanent", async () => {
    const generator = vi.fn(async () => "x");
    const controller = new CustomSequentialController(config([WRITER]), generator);
    await expect(controller.process("", "tech")).rejects.toBeInstanceOf(PermanentError);
    expect(generator).not.toHaveBeenCalled();
  });

  it("needs at least one agent", () => {
    expect(() => new CustomSequentialController(config([]), vi.fn(async () => "x"))).toThrow(
      'Controller "custom_sequential" needs at least 1 agent profile(s), got 0',
    );
  });

  it("freezes its config", () => {
    const controller = new CustomSequentialController(config([WRITER]), vi.fn(async () => "x"));
    expect(Object.isFrozen(controller.config)).toBe(true);
    expect(Object.isFrozen(controller.config.agents)).toBe(true);
    expect(Object.isFrozen(controller.config.agents[0])).toBe(true);
  });
});

// ── crew_sequential ─────────────────────────────────

describe("CrewSequentialController", () => {
  it("hands each agent's output to the next", async () => {
    const { generator, requests } = scripted(["facts", "article"]);
    const controller = new CrewSequentialController(config([RESEARCHER, WRITER]), generator);

    const text = await controller.process("Health", "casual");

    expect(text).toBe("article");
    expect(requests.map((r) => r.system.split("\n")[0])).toEqual(["You are the Researcher.", "You are the Writer."]);
    expect(requests[0].prompt).toBe(
      'Task 1 of 2. Contribute your part as the Researcher toward an article in the "Health" category, written in a casual style.\n\nYou are starting the work.',
    );
    expect(requests[1].prompt).toBe(
      'Task 2 of 2. Produce the final, complete text of an article in the "Health" category, written in a casual style.\n\nOutput of the previous task (Researcher):\nfacts',
    );
  });

  it("propagates generator failures", async () => {
    const generator: TextGenerator = async () => {
      throw new TransientError("rate limited");
    };
    const controller = new CrewSequentialController(config([RESEARCHER, WRITER]), generator);
    await expect(controller.process("AI", "tech")).rejects.toBeInstanceOf(TransientError);
  });
});

// ── crew_manager ────────────────────────────────────

describe("extractJson", () => {
  it("parses plain JSON", () => {
    expect(extractJson('{"a":1}')).toEqual({ a: 1 });
  });

  it("parses a fenced block", () => {
    expect(extractJson('Here is the plan:\n```json\n{"a":2}\n```\nDone.')).toEqual({ a: 2 });
  });

  it("parses an object embedded in prose", () => {
    expect(extractJson('Sure! {"a":3} Hope that helps.')).toEqual({ a: 3 });
  });

  it("returns null when nothing parses", () => {
    expect(extractJson("no json here")).toBeNull();
  });
});

describe("parsePlan", () => {
  const roles = ["Researcher", "Writer"];

  it("accepts a valid plan", () => {
    const plan = parsePlan('{"assignments":[{"role":"Writer","task":"Write it"}]}', roles);
    expect(plan.assignments).toEqual([{ role: "Writer", task: "Write it" }]);
  });

  it("rejects a plan with no assignments as transient", () => {
    expect(() => parsePlan('{"assignments":[]}', roles)).toThrow(TransientError);
  });

  it("rejects unparseable text as transient", () => {
    expect(() => parsePlan("let me think about it", roles)).toThrow(/^Manager returned a malformed plan: /);
  });

  it("rejects an unknown role as transient", () => {
    expect(() => parsePlan('{"assignments":[{"role":"Designer","task":"Draw"}]}', roles)).toThrow(
      'Manager assigned work to unknown role "Designer"',
    );
  });
});

describe("CrewManagerController", () => {
  it("plans, delegates in plan order, then synthesizes", async () => {
    const plan = JSON.stringify({
      assignments: [
        { role: "Researcher", task: "Collect facts" },
        { role: "Writer", task: "Write the piece" },
      ],
    });
    const { generator, requests } = scripted([plan, "fact list", "draft text", "merged article"]);
    const controller = new CrewManagerController(config([MANAGER, RESEARCHER, WRITER]), generator);

    const text = await controller.process("AI", "tech");

    expect(text).toBe("merged article");
    expect(requests).toHaveLength(4);
    expect(requests.map((r) => r.system.split("\n")[0])).toEqual([
      "You are the Content Manager.",
      "You are the Researcher.",
      "You are the Writer.",
      "You are the Content Manager.",
    ]);
    expect(requests[0].prompt).toContain("Available team members: Researcher, Writer.");
    expect(requests[1].prompt).toBe("Collect facts");
    expect(requests[2].prompt).toBe("Write the piece\n\nWork so far:\n[Researcher]\nfact list");
    expect(requests[3].prompt).toContain("[Researcher]\nfact list\n\n[Writer]\ndraft text");
  });

  it("fails transiently on a malformed plan without calling workers", async () => {
    const { generator, requests } = scripted(["not a plan"]);
    const controller = new CrewManagerController(config([MANAGER, RESEARCHER]), generator);

    await expect(controller.process("AI", "tech")).rejects.toBeInstanceOf(TransientError);
    expect(requests).toHaveLength(1);
  });

  it("needs a manager and at least one worker", () => {
    expect(() => new CrewManagerController(config([MANAGER]), vi.fn(async () => "x"))).toThrow(PermanentError);
  });
});

// ── default registry ────────────────────────────────

describe("createDefaultRegistry", () => {
  it("registers the three built-in controllers", () => {
    const registry = createDefaultRegistry(vi.fn(async () => "x"));
    expect(registry.types()).toEqual(["custom_sequential", "crew_manager", "crew_sequential"]);
    expect(registry.describe("crew_manager")).toBe("Crew hierarchical process (manager delegates to agents)");
  });

  it("builds controllers of the requested type", () => {
    const registry = createDefaultRegistry(vi.fn(async () => "x"));
    const resolution = registry.resolve("crew_sequential", config([RESEARCHER, WRITER]));
    expect(resolution.ok && resolution.controller.type).toBe("crew_sequential");
  });

  it("reports a crew_manager with one agent as factory_failed", () => {
    const registry = createDefaultRegistry(vi.fn(async () => "x"));
    const resolution = registry.resolve("crew_manager", config([MANAGER]));
    expect(!resolution.ok && resolution.error.reason).toBe("factory_failed");
  });
});
