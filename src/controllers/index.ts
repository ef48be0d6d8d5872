import type { TextGenerator } from "../providers/generate.js";
import { ControllerRegistry } from "./registry.js";
import { CustomSequentialController, CrewSequentialController } from "./sequential.js";
import { CrewManagerController } from "./crew-manager.js";

export { ControllerRegistry, type Resolution } from "./registry.js";
export type { Controller, ControllerFactory, ControllerRegistration } from "./types.js";

/**
 * Registry holding the built-in controller variants, all generating
 * through `generator`.
 */
export function createDefaultRegistry(generator: TextGenerator): ControllerRegistry {
  return new ControllerRegistry()
    .register("custom_sequential", {
      description: "Custom sequential pipeline (research, outline, draft, polish)",
      create: (config) => new CustomSequentialController(config, generator),
    })
    .register("crew_manager", {
      description: "Crew hierarchical process (manager delegates to agents)",
      create: (config) => new CrewManagerController(config, generator),
    })
    .register("crew_sequential", {
      description: "Crew sequential process (agents hand off in order)",
      create: (config) => new CrewSequentialController(config, generator),
    });
}
