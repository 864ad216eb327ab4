import { describe, expect, it } from "vitest";

import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "./error-format.js";
import {
  AggregationError,
  ConfigurationError,
  LifecyclePhaseError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Parameter file missing.",
      message: "Parameter file not found at /tmp/params.yaml.",
      hint: "Check the --parameter-file path.",
      next: "Run infra-validate init",
    });

    const lines = formatErrorLines(error);

    expect(lines.map((line) => line.kind)).toEqual(["title", "message", "hint", "next", "location"]);
    expect(lines[0]?.text).toBe("Parameter file missing.");
    expect(lines[1]?.text).toBe("Parameter file not found at /tmp/params.yaml.");
  });

  it("includes debug details when requested", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.template,
      title: "Template missing.",
      message: "Could not load run-summary.",
      cause: new Error("boom"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.some((line) => line.kind === "code" && line.text === "TEMPLATE_ERROR")).toBe(true);
    expect(lines.some((line) => line.kind === "name" && line.text === "UserFacingError")).toBe(
      true,
    );
    expect(lines.some((line) => line.kind === "cause" && line.text === "boom")).toBe(true);

    const stack = lines.find((line) => line.kind === "stack");
    expect(stack?.text).toContain("UserFacingError");
  });

  it("maps configuration errors to a config title and hint", () => {
    const lines = formatErrorLines(new ConfigurationError("Test platform is not set."));

    expect(lines[0]).toEqual({ kind: "title", text: "Configuration invalid." });
    expect(lines[1]).toEqual({ kind: "message", text: "Test platform is not set." });
    expect(lines[2]).toEqual({
      kind: "hint",
      text: "Check the parameter file and command-line overrides.",
    });
  });

  it("reports the phase and recorded location of lifecycle errors", () => {
    const error = new LifecyclePhaseError("disk full", "Executed", "/repo/controller.ts:10:5");

    const lines = formatErrorLines(error);

    expect(lines).toEqual([
      { kind: "title", text: "Run failed during Executed." },
      { kind: "message", text: "disk full" },
      { kind: "phase", text: "Executed" },
      { kind: "location", text: "/repo/controller.ts:10:5" },
    ]);
  });

  it("points at the missing report for aggregation errors", () => {
    const lines = formatErrorLines(new AggregationError("Expected report missing.", "/r/a-junit.xml"));

    expect(lines[0]?.text).toBe("Result reports could not be aggregated.");
    expect(lines.find((line) => line.kind === "hint")?.text).toBe("Expected report: /r/a-junit.xml");
  });

  it("defaults unknown inputs to an unexpected error title", () => {
    const lines = formatErrorLines("boom");

    expect(lines[0]?.text).toBe("Unexpected error");
    expect(lines[1]?.text).toBe("boom");
  });
});

describe("renderErrorLines", () => {
  it("prefixes hint, phase and location lines", () => {
    const text = renderErrorLines(
      [
        { kind: "title", text: "Run failed during Executed." },
        { kind: "hint", text: "Retry later." },
        { kind: "phase", text: "Executed" },
        { kind: "location", text: "a.ts:1:2" },
      ],
      createAnsiFormatter(false),
    );

    expect(text).toBe("Run failed during Executed.\nHint: Retry later.\nPhase: Executed\nAt: a.ts:1:2");
  });
});

describe("resolveColorEnabled", () => {
  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false } })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true } })).toBe(true);
  });

  it("respects explicit useColor flags", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: true })).toBe(true);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    const format = createAnsiFormatter(false);
    expect(format("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    const format = createAnsiFormatter(true);
    expect(format("alert", ["red"])).toBe("\x1b[31malert\x1b[0m");
  });
});
