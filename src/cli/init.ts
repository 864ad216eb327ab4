import { initRepoParameters } from "../core/config-discovery.js";

export async function initCommand(opts: { force?: boolean; cwd?: string }): Promise<void> {
  try {
    const result = initRepoParameters({ cwd: opts.cwd ?? process.cwd(), force: opts.force });

    if (result.status === "created") {
      console.log(`Created parameter file at ${result.filePath}`);
      console.log(`Edit ${result.filePath} to choose the platform and test selection.`);
      return;
    }

    if (result.status === "overwritten") {
      console.log(`Overwrote parameter file at ${result.filePath}`);
      return;
    }

    console.log(`Parameter file already exists at ${result.filePath}`);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    console.error(`Init failed: ${detail}`);
    process.exitCode = 1;
  }
}
