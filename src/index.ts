import { Command } from "commander";

import { initCommand } from "./cli/init.js";
import { platformsCommand } from "./cli/platforms.js";
import { registerRunCommand, type RunCommandDeps } from "./cli/run.js";
import { createDefaultRegistry } from "./controllers/registry.js";

export const CLI_VERSION = "0.1.0";

export function buildProgram(deps: RunCommandDeps = {}): Command {
  const registry = deps.registry ?? createDefaultRegistry();
  const program = new Command();

  program
    .name("infra-validate")
    .description("Run infrastructure validation test passes against a platform")
    .version(CLI_VERSION);

  registerRunCommand(program, { ...deps, registry });

  program
    .command("platforms")
    .description("List registered test platforms")
    .action(() => {
      platformsCommand(registry);
    });

  program
    .command("init")
    .description("Create .infra-validate/parameters.yaml at the git repository root")
    .option("--force", "Overwrite an existing parameter file", false)
    .action(async (opts: { force: boolean }) => {
      await initCommand({ force: opts.force });
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}
