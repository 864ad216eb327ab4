import { describe, expect, it } from "vitest";

import { MapStateScope, MemoryLogger } from "../__tests__/fakes.js";

import { RUN_STATUS_NAME, processEnvScope, runWithStateGuard } from "./state-guard.js";

describe("runWithStateGuard", () => {
  it("removes names added during the run and publishes the status", async () => {
    const scope = new MapStateScope({ PATH: "/bin", HOME: "/home/test" });
    const logger = new MemoryLogger();

    const result = await runWithStateGuard({
      scope,
      logger,
      body: async () => {
        scope.set("INFRA_VALIDATE_RUN_ID", "abc");
        scope.set("HOME", "/changed");
        return "Success";
      },
    });

    expect(result).toEqual({ status: "Success", exitCode: 0, forced: false, removed: ["INFRA_VALIDATE_RUN_ID"] });
    expect(scope.names().sort()).toEqual(["HOME", "PATH", RUN_STATUS_NAME].sort());
    expect(scope.values.get(RUN_STATUS_NAME)).toBe("Success");
    expect(logger.find("run.status")?.payload).toEqual({ status: "Success" });
  });

  it("maps a thrown body error to Failure and still restores", async () => {
    const scope = new MapStateScope({ PATH: "/bin" });
    const logger = new MemoryLogger();

    const result = await runWithStateGuard({
      scope,
      logger,
      body: async () => {
        scope.set("TEMP_NAME", "1");
        throw new Error("provisioning exploded");
      },
    });

    expect(result.status).toBe("Failure");
    expect(result.exitCode).toBe(1);
    expect(result.error?.message).toBe("provisioning exploded");
    expect(scope.names().sort()).toEqual(["PATH", RUN_STATUS_NAME].sort());

    const logged = logger.find("run.error");
    expect(logged?.level).toBe("error");
    expect(logged?.payload.message).toBe("provisioning exploded");
    expect(String(logged?.payload.location)).toMatch(/state-guard\.test\.ts:\d+:\d+$/);
  });

  it("forces a zero exit code but logs the real status first", async () => {
    const logger = new MemoryLogger();

    const result = await runWithStateGuard({
      scope: new MapStateScope(),
      logger,
      forceSuccess: true,
      body: async () => "Failure",
    });

    expect(result).toMatchObject({ status: "Failure", exitCode: 0, forced: true });
    const types = logger.types();
    expect(types.indexOf("run.status")).toBeLessThan(types.indexOf("run.status.forced"));
    expect(logger.find("run.status")?.payload).toEqual({ status: "Failure" });
    expect(logger.find("run.status.forced")?.payload).toEqual({
      computed: "Failure",
      reported: "Success",
    });
  });

  it("keeps an exempt status name that was already present", async () => {
    const scope = new MapStateScope({ [RUN_STATUS_NAME]: "Failure" });

    await runWithStateGuard({ scope, logger: new MemoryLogger(), body: async () => "Success" });

    expect(scope.values.get(RUN_STATUS_NAME)).toBe("Success");
  });

  it("logs cleanup failures without rethrowing", async () => {
    const scope = new MapStateScope();
    scope.failRemovalOf.add("STUCK");
    const logger = new MemoryLogger();

    const result = await runWithStateGuard({
      scope,
      logger,
      body: async () => {
        scope.set("STUCK", "1");
        scope.set("LOOSE", "1");
        return "Success";
      },
    });

    expect(result.removed).toEqual(["LOOSE"]);
    expect(logger.find("state.remove_failed")?.payload).toEqual({ message: "cannot remove STUCK" });
  });

  it("guards a plain environment object", async () => {
    const env: NodeJS.ProcessEnv = { KEEP: "1" };

    const result = await runWithStateGuard({
      scope: processEnvScope(env),
      logger: new MemoryLogger(),
      body: async () => {
        env.ADDED = "x";
        return "Failure";
      },
    });

    expect(result.exitCode).toBe(1);
    expect(env).toEqual({ KEEP: "1", [RUN_STATUS_NAME]: "Failure" });
  });

  it("restores the baseline when the log cannot be written", async () => {
    const scope = new MapStateScope({ BASE: "1" });
    const logger = new MemoryLogger();
    logger.failOn = new Set(["run.error", "run.status", "state.restored"]);

    const result = await runWithStateGuard({
      scope,
      logger,
      body: async () => {
        scope.set("LEAKED", "1");
        throw new Error("body failed");
      },
    });

    expect(scope.names().sort()).toEqual(["BASE", RUN_STATUS_NAME].sort());
    expect(scope.values.get(RUN_STATUS_NAME)).toBe("Failure");
    expect(result).toMatchObject({ status: "Failure", exitCode: 1, removed: ["LEAKED"] });
    expect(result.error?.message).toBe("body failed");
    expect(result.logErrors?.map((err) => err.message)).toEqual([
      "ENOSPC: cannot write run.error",
      "ENOSPC: cannot write run.status",
      "ENOSPC: cannot write state.restored",
    ]);
  });

  it("keeps going when logging a cleanup failure also fails", async () => {
    const scope = new MapStateScope();
    scope.failRemovalOf.add("STUCK");
    const logger = new MemoryLogger();
    logger.failOn = new Set(["state.remove_failed"]);

    const result = await runWithStateGuard({
      scope,
      logger,
      body: async () => {
        scope.set("STUCK", "1");
        scope.set("LOOSE", "1");
        return "Success";
      },
    });

    expect(result.removed).toEqual(["LOOSE"]);
    expect(result.status).toBe("Success");
    expect(result.logErrors).toHaveLength(1);
    expect(logger.find("state.restored")?.payload).toEqual({ removed: ["LOOSE"] });
  });
});
