/*
Purpose: read JUnit-style result artifacts and locate them by naming convention.
Assumptions: only the tests/failures/errors attributes of each <testsuite> under <testsuites>
  are consumed; nothing else in the document is required to exist.
Usage: const records = await collectReports(ctx.reportDir, expectedReportNames(ctx.runId));
*/

import path from "node:path";

import { XMLParser, XMLValidator } from "fast-xml-parser";
import fse from "fs-extra";

import { AggregationError } from "./errors.js";
import { siblingRunId } from "./run-identity.js";
import { isPlainRecord } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type ReportRecord = Readonly<{
  tests: number;
  failures: number;
  errors: number;
}>;

const COUNT_FIELDS = ["tests", "failures", "errors"] as const;

const REPORT_SUFFIX = "-junit.xml";

// =============================================================================
// NAMING CONVENTION
// =============================================================================

export function reportFileName(runId: string): string {
  return `${runId}${REPORT_SUFFIX}`;
}

/**
 * A single run writes `<runId>-junit.xml`; a fan-out parent expects one artifact per
 * sibling, `<runId>-<i>-junit.xml` for i = 1..childCount.
 */
export function expectedReportNames(runId: string, opts: { childCount?: number } = {}): string[] {
  const childCount = opts.childCount ?? 0;
  if (childCount <= 0) {
    return [reportFileName(runId)];
  }

  return Array.from({ length: childCount }, (_, i) => reportFileName(siblingRunId(runId, i + 1)));
}

// =============================================================================
// PARSING
// =============================================================================

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseAttributeValue: false,
  isArray: (name) => name === "testsuite",
});

export function parseReport(xml: string, source = "<inline>"): ReportRecord {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new AggregationError(
      `Report ${source} is not well-formed XML (line ${validation.err.line}): ${validation.err.msg}`,
      source,
    );
  }

  const document: unknown = parser.parse(xml);
  const root = isPlainRecord(document) ? document.testsuites : undefined;
  const suites = isPlainRecord(root) ? root.testsuite : undefined;

  if (!Array.isArray(suites) || suites.length === 0) {
    throw new AggregationError(
      `Report ${source} has no <testsuite> element under <testsuites>.`,
      source,
    );
  }

  let record: ReportRecord = { tests: 0, failures: 0, errors: 0 };
  for (const suite of suites) {
    record = {
      tests: record.tests + readCount(suite, "tests", source),
      failures: record.failures + readCount(suite, "failures", source),
      errors: record.errors + readCount(suite, "errors", source),
    };
  }
  return record;
}

export async function readReport(filePath: string): Promise<ReportRecord> {
  let xml: string;
  try {
    xml = await fse.readFile(filePath, "utf8");
  } catch (err) {
    throw new AggregationError(`Report ${filePath} could not be read.`, filePath, err);
  }
  return parseReport(xml, filePath);
}

/** Reads every expected artifact; the first missing or unparsable one aborts collection. */
export async function collectReports(reportDir: string, names: string[]): Promise<ReportRecord[]> {
  const records: ReportRecord[] = [];

  for (const name of names) {
    const filePath = path.join(reportDir, name);
    if (!(await fse.pathExists(filePath))) {
      throw new AggregationError(`Expected report ${name} is missing from ${reportDir}.`, filePath);
    }
    records.push(await readReport(filePath));
  }

  return records;
}

// =============================================================================
// INTERNALS
// =============================================================================

function readCount(
  suite: unknown,
  field: (typeof COUNT_FIELDS)[number],
  source: string,
): number {
  const raw = isPlainRecord(suite) ? suite[`@_${field}`] : undefined;
  const text = typeof raw === "string" ? raw.trim() : "";

  if (!/^\d+$/.test(text)) {
    throw new AggregationError(
      `Report ${source} has a missing or invalid "${field}" attribute on <testsuite>.`,
      source,
    );
  }

  return Number.parseInt(text, 10);
}
