import type { ControllerRegistry } from "../controllers/registry.js";

export function platformsCommand(registry: ControllerRegistry): void {
  const platforms = registry.platforms();
  if (platforms.length === 0) {
    console.log("No platforms registered.");
    process.exitCode = 1;
    return;
  }

  for (const platform of platforms) {
    console.log(platform);
  }
}
