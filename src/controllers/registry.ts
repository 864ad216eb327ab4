import { ConfigurationError } from "../core/errors.js";
import type { TestDefinitionValidator } from "../core/lifecycle.js";

import type { ControllerDeps, ControllerFactory, TestController } from "./controller.js";
import { LocalController } from "./local/local-controller.js";
import { validateTestDefinitions } from "./local/test-definitions.js";

// =============================================================================
// TYPES
// =============================================================================

export type PlatformRegistration = {
  platform: string;
  factory: ControllerFactory;
  validateTestDefinitions?: TestDefinitionValidator;
};

// =============================================================================
// REGISTRY
// =============================================================================

export class ControllerRegistry {
  private readonly entries = new Map<string, PlatformRegistration>();

  register(
    platform: string,
    factory: ControllerFactory,
    opts: { validateTestDefinitions?: TestDefinitionValidator } = {},
  ): this {
    const id = normalizePlatform(platform);
    if (!id) {
      throw new ConfigurationError("Platform name must not be empty.");
    }
    if (this.entries.has(id)) {
      throw new ConfigurationError(`Platform "${platform}" is already registered.`);
    }
    this.entries.set(id, { platform: platform.trim(), factory, ...opts });
    return this;
  }

  has(platform: string): boolean {
    return this.entries.has(normalizePlatform(platform));
  }

  platforms(): string[] {
    return [...this.entries.values()].map((entry) => entry.platform).sort();
  }

  definitionValidator(platform: string): TestDefinitionValidator | undefined {
    return this.entries.get(normalizePlatform(platform))?.validateTestDefinitions;
  }

  /** Unknown names fail before any controller is constructed. */
  create(platform: string, deps: ControllerDeps): TestController {
    const entry = this.entries.get(normalizePlatform(platform));
    if (!entry) {
      const known = this.platforms();
      throw new ConfigurationError(
        `Unknown test platform "${platform}". Registered platforms: ${known.length > 0 ? known.join(", ") : "(none)"}.`,
      );
    }
    return entry.factory(deps);
  }
}

export function createDefaultRegistry(): ControllerRegistry {
  return new ControllerRegistry().register("Local", (deps) => new LocalController(deps), {
    validateTestDefinitions,
  });
}

function normalizePlatform(platform: string): string {
  return platform.trim().toLowerCase();
}
