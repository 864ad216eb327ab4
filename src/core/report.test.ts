import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { junitXml } from "../__tests__/fakes.js";

import { AggregationError } from "./errors.js";
import { collectReports, expectedReportNames, parseReport, reportFileName } from "./report.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

describe("report naming", () => {
  it("names a single run's artifact after its token", () => {
    expect(reportFileName("abc")).toBe("abc-junit.xml");
    expect(expectedReportNames("abc")).toEqual(["abc-junit.xml"]);
  });

  it("expects one artifact per sibling under fan-out", () => {
    expect(expectedReportNames("abc", { childCount: 3 })).toEqual([
      "abc-1-junit.xml",
      "abc-2-junit.xml",
      "abc-3-junit.xml",
    ]);
  });
});

describe("parseReport", () => {
  it("reads counts from a testsuite", () => {
    expect(parseReport(junitXml({ tests: 10, failures: 2, errors: 1 }))).toEqual({
      tests: 10,
      failures: 2,
      errors: 1,
    });
  });

  it("sums several testsuites", () => {
    const xml = junitXml({ tests: 3, failures: 1, errors: 0 }, { tests: 4, failures: 0, errors: 2 });
    expect(parseReport(xml)).toEqual({ tests: 7, failures: 1, errors: 2 });
  });

  it("rejects malformed XML", () => {
    expect(() => parseReport("<testsuites><testsuite>", "broken.xml")).toThrow(AggregationError);
  });

  it("rejects a document without testsuite elements", () => {
    expect(() => parseReport("<testsuites></testsuites>", "empty.xml")).toThrow(
      "Report empty.xml has no <testsuite> element under <testsuites>.",
    );
  });

  it("rejects negative or missing counts", () => {
    const negative =
      '<testsuites><testsuite tests="-1" failures="0" errors="0"></testsuite></testsuites>';
    const missing = '<testsuites><testsuite tests="2" failures="0"></testsuite></testsuites>';

    expect(() => parseReport(negative, "neg.xml")).toThrow(
      'Report neg.xml has a missing or invalid "tests" attribute on <testsuite>.',
    );
    expect(() => parseReport(missing, "missing.xml")).toThrow(
      'Report missing.xml has a missing or invalid "errors" attribute on <testsuite>.',
    );
  });
});

describe("collectReports", () => {
  it("reads every expected artifact in order", async () => {
    const dir = makeTempDir("reports-");
    fs.writeFileSync(path.join(dir, "r-1-junit.xml"), junitXml({ tests: 5, failures: 0, errors: 0 }));
    fs.writeFileSync(path.join(dir, "r-2-junit.xml"), junitXml({ tests: 5, failures: 1, errors: 0 }));

    const records = await collectReports(dir, expectedReportNames("r", { childCount: 2 }));

    expect(records).toEqual([
      { tests: 5, failures: 0, errors: 0 },
      { tests: 5, failures: 1, errors: 0 },
    ]);
  });

  it("fails on a missing artifact", async () => {
    const dir = makeTempDir("reports-");
    fs.writeFileSync(path.join(dir, "r-1-junit.xml"), junitXml({ tests: 5, failures: 0, errors: 0 }));

    const error = await collectReports(dir, expectedReportNames("r", { childCount: 2 })).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(AggregationError);
    if (!(error instanceof AggregationError)) return;
    expect(error.reportPath).toBe(path.join(dir, "r-2-junit.xml"));
    expect(error.message).toBe(`Expected report r-2-junit.xml is missing from ${dir}.`);
  });
});
