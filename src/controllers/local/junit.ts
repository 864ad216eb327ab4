import { XMLBuilder } from "fast-xml-parser";

export type TestCaseOutcome = "pass" | "fail" | "error";

export type TestCaseResult = {
  name: string;
  area: string;
  iteration: number;
  outcome: TestCaseOutcome;
  durationMs: number;
  message?: string;
  output?: string;
};

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  suppressEmptyNode: true,
});

export function buildJunitReport(suiteName: string, results: readonly TestCaseResult[]): string {
  const failures = results.filter((r) => r.outcome === "fail").length;
  const errors = results.filter((r) => r.outcome === "error").length;
  const totalSeconds = results.reduce((sum, r) => sum + r.durationMs, 0) / 1000;

  const testcases = results.map((result) => {
    const testcase: Record<string, unknown> = {
      "@_name": result.iteration > 1 ? `${result.name}#${result.iteration}` : result.name,
      "@_classname": `${suiteName}.${result.area}`,
      "@_time": seconds(result.durationMs),
    };
    if (result.outcome !== "pass") {
      testcase[result.outcome === "fail" ? "failure" : "error"] = {
        "@_message": result.message ?? result.outcome,
        ...(result.output ? { "#text": result.output } : {}),
      };
    }
    return testcase;
  });

  return builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    testsuites: {
      testsuite: {
        "@_name": suiteName,
        "@_tests": String(results.length),
        "@_failures": String(failures),
        "@_errors": String(errors),
        "@_time": totalSeconds.toFixed(3),
        testcase: testcases,
      },
    },
  });
}

function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}
