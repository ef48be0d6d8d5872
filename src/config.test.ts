import { describe, it, expect } from "vitest";
import { fileURLToPath } from "url";
import {
  DEFAULT_PROFILES,
  controllerConfigFor,
  createBenchmarkConfig,
  loadControllerProfiles,
  parseControllerList,
  parseControllerProfiles,
} from "./config.js";

const BUNDLED_PROFILES = fileURLToPath(new URL("../config/controllers.toml", import.meta.url));

describe("loadControllerProfiles", () => {
  it("loads the bundled profile file", async () => {
    const profiles = await loadControllerProfiles(BUNDLED_PROFILES);

    expect(profiles.defaults.agents?.map((a) => a.role)).toEqual(["Content Manager", "Researcher", "Writer"]);
    expect(profiles.defaults.tools).toEqual(["web_search", "trend_lookup"]);
    expect(profiles.defaults.temperature).toBe(0.7);
    expect(profiles.controllers.custom_sequential.agents?.map((a) => a.role)).toEqual(["Senior Writer"]);
    expect(profiles.controllers.crew_sequential.temperature).toBe(0.6);
  });

  it("throws on a missing file", async () => {
    await expect(loadControllerProfiles("nonexistent/controllers.toml")).rejects.toThrow();
  });
});

describe("parseControllerProfiles", () => {
  it("maps snake_case keys", () => {
    const profiles = parseControllerProfiles(`
[controllers.crew_manager]
max_output_tokens = 2048
`);
    expect(profiles.controllers.crew_manager.maxOutputTokens).toBe(2048);
    expect(profiles.defaults).toEqual({});
  });

  it("rejects out-of-range values", () => {
    expect(() => parseControllerProfiles("[defaults]\ntemperature = 3.5\n")).toThrow();
  });

  it("rejects agents without a role", () => {
    expect(() =>
      parseControllerProfiles(`
[[defaults.agents]]
goal = "Write"
backstory = "Test."
`),
    ).toThrow();
  });
});

describe("controllerConfigFor", () => {
  it("layers controller profile over defaults", async () => {
    const profiles = await loadControllerProfiles(BUNDLED_PROFILES);
    const configFor = controllerConfigFor(profiles, "openai:gpt-4o-mini");

    const custom = configFor("custom_sequential");
    expect(custom.model).toBe("openai:gpt-4o-mini");
    expect(custom.agents.map((a) => a.role)).toEqual(["Senior Writer"]);
    expect(custom.tools).toEqual([]);
    expect(custom.temperature).toBe(0.7);

    const crew = configFor("crew_sequential");
    expect(crew.agents.map((a) => a.role)).toEqual(["Researcher", "Writer", "Editor"]);
    expect(crew.tools).toEqual(["web_search", "trend_lookup"]);
    expect(crew.temperature).toBe(0.6);

    const manager = configFor("crew_manager");
    expect(manager.agents.map((a) => a.role)).toEqual(["Content Manager", "Researcher", "Writer"]);
    expect(manager.maxOutputTokens).toBeUndefined();
  });

  it("falls back to the built-in roster", () => {
    const config = controllerConfigFor({ defaults: {}, controllers: {} }, "openai:gpt-4o")("anything");
    expect(config.agents).toEqual(DEFAULT_PROFILES.defaults.agents);
    expect(config.tools).toEqual([]);
  });
});

describe("parseControllerList", () => {
  it("splits comma lists and repeated flags", () => {
    expect(parseControllerList(["custom_sequential,crew_manager", " crew_sequential "])).toEqual([
      "custom_sequential",
      "crew_manager",
      "crew_sequential",
    ]);
  });

  it("drops empty entries", () => {
    expect(parseControllerList(["a,,b,"])).toEqual(["a", "b"]);
  });

  it("returns undefined when the flag was absent", () => {
    expect(parseControllerList(undefined)).toBeUndefined();
  });
});

describe("createBenchmarkConfig", () => {
  it("uses defaults", () => {
    const config = createBenchmarkConfig({});
    expect(config.workload).toEqual({ category: "AI", style: "tech" });
    expect(config.model).toBe("openai:gpt-4o");
    expect(config.controllerTypes).toBeUndefined();
    expect(config.retryPolicy.maxRetries).toBe(3);
    expect(config.retryPolicy.initialDelayMs).toBe(1000);
    expect(config.retryPolicy.backoffMultiplier).toBe(2);
    expect(config.concurrency).toBe(4);
    expect(config.gracePeriodMs).toBe(5000);
    expect(config.deadlineMs).toBeUndefined();
    expect(config.archive).toBe(true);
    expect(config.logDir).toBe(".");
  });

  it("converts seconds to milliseconds", () => {
    const config = createBenchmarkConfig({ initialDelay: 0.5, grace: 2, timeout: 30 });
    expect(config.retryPolicy.initialDelayMs).toBe(500);
    expect(config.gracePeriodMs).toBe(2000);
    expect(config.deadlineMs).toBe(30_000);
  });

  it("normalizes a bare model name", () => {
    expect(createBenchmarkConfig({ model: "gpt-4o-mini" }).model).toBe("openai:gpt-4o-mini");
  });

  it("parses the controller list", () => {
    expect(createBenchmarkConfig({ controllers: ["custom_sequential,crew_manager"] }).controllerTypes).toEqual([
      "custom_sequential",
      "crew_manager",
    ]);
  });

  it("accepts zero retries", () => {
    expect(createBenchmarkConfig({ maxRetries: 0 }).retryPolicy.maxRetries).toBe(0);
  });

  it("rejects an invalid backoff", () => {
    expect(() => createBenchmarkConfig({ backoff: 0.5 })).toThrow(RangeError);
  });
});
