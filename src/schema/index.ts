/**
 * src/schema/index.ts
 * AJV (2020-12) validator for policy test case files.
 */

import { Ajv2020 } from "ajv/dist/2020.js";
import testCase from "./policyTestCase.schema.json" with { type: "json" };
import type { PolicyTestCaseConfig } from "../types/testcase.js";

export const ajv = new Ajv2020({
  allErrors: true,
  strict: "log",
});

export const validateTestCase = ajv.compile<PolicyTestCaseConfig>(testCase);

export function formatSchemaErrors(errors: typeof validateTestCase.errors): string {
  return (errors ?? [])
    .map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`)
    .join("; ");
}
