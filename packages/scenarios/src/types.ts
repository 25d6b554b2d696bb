/**
 * Scenario configuration types and runtime validation.
 */
import { z } from "zod";

const str = z.string({ invalid_type_error: "must be a string" });
const nonEmptyStr = z
  .string({ invalid_type_error: "must be a non-empty string" })
  .min(1, "must be a non-empty string");
const containsAll = z
  .array(nonEmptyStr, { invalid_type_error: "must be a non-empty string array" })
  .min(1, "must be a non-empty string array");
const count = z.number({ invalid_type_error: "must be a number" }).int().nonnegative();

export const traceSummarySchema = z.object({
  totalEvents: count,
  unitsRun: count,
  procCalls: count,
  procsByName: z.record(count),
  defEvaluations: count,
  failures: count,
});

export type TraceSummary = z.infer<typeof traceSummarySchema>;

export const fileAssertionSchema = z
  .object({
    path: str,
    sha256: str.optional(),
    text: str.optional(),
    json: z.unknown().optional(),
    jsonSubset: z.unknown().optional(),
    absent: z.literal(true, { errorMap: () => ({ message: "must be true" }) }).optional(),
  })
  .superRefine((f, ctx) => {
    const kinds = [f.sha256, f.text, f.json, f.jsonSubset, f.absent].filter((v) => v !== undefined);
    if (kinds.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "must define exactly one of 'sha256', 'text', 'json', 'jsonSubset', or 'absent'",
      });
    }
  });

export type FileAssertion = z.infer<typeof fileAssertionSchema>;

const expectationsSchema = z.object(
  {
    exitCode: z
      .number({
        required_error: "is required and must be a number",
        invalid_type_error: "is required and must be a number",
      })
      .int(),
    stdoutJson: z.unknown().optional(),
    stdoutJsonSubset: z.unknown().optional(),
    stdoutText: str.optional(),
    stdoutContains: str.optional(),
    stdoutContainsAll: containsAll.optional(),
    stdoutRegex: str.optional(),
    stderrJson: z.unknown().optional(),
    stderrJsonSubset: z.unknown().optional(),
    stderrText: str.optional(),
    stderrContains: str.optional(),
    stderrContainsAll: containsAll.optional(),
    stderrRegex: str.optional(),
    traceSummary: traceSummarySchema.optional(),
    traceSummarySubset: z.record(z.unknown()).optional(),
    files: z.array(fileAssertionSchema, { invalid_type_error: "must be an array" }).optional(),
  },
  {
    required_error: "is required and must be an object",
    invalid_type_error: "is required and must be an object",
  }
);

export type Expectations = z.infer<typeof expectationsSchema>;

const EXCLUSIVE_PAIRS = [
  ["stdoutJson", "stdoutJsonSubset"],
  ["stderrJson", "stderrJsonSubset"],
  ["traceSummary", "traceSummarySubset"],
] as const;

export const scenarioConfigSchema = z
  .object(
    {
      cmd: z
        .array(str, {
          required_error: "is required and must be a non-empty string array",
          invalid_type_error: "is required and must be a non-empty string array",
        })
        .min(1, "is required and must be a non-empty string array"),
      stdin: str.optional(),
      timeoutMs: z.number({ invalid_type_error: "must be a number" }).positive().optional(),
      /** Written to pile.json in the working directory. */
      config: z.record(z.unknown(), { invalid_type_error: "must be an object" }).optional(),
      capture: z
        .object(
          { trace: z.boolean({ invalid_type_error: "must be a boolean" }).optional() },
          { invalid_type_error: "must be an object" }
        )
        .optional(),
      meta: z
        .object(
          {
            description: str.optional(),
            tags: z.array(str, { invalid_type_error: "must be a string array" }).optional(),
          },
          { invalid_type_error: "must be an object" }
        )
        .optional(),
      expect: expectationsSchema,
    },
    { invalid_type_error: "must be a JSON object" }
  )
  .superRefine((cfg, ctx) => {
    for (const [a, b] of EXCLUSIVE_PAIRS) {
      if (cfg.expect[a] !== undefined && cfg.expect[b] !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `'expect.${a}' and 'expect.${b}' are mutually exclusive`,
        });
      }
    }
  });

export type ScenarioConfig = z.infer<typeof scenarioConfigSchema>;

function formatIssuePath(issuePath: (string | number)[]): string {
  return issuePath
    .map((seg, i) => (typeof seg === "number" ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join("");
}

/**
 * Fail-fast runtime validation of parsed scenario JSON.
 * Throws with a readable error including the scenario path and the invalid field.
 */
export function validateScenarioConfig(raw: unknown, scenarioPath: string): ScenarioConfig {
  const result = scenarioConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const where = issue.path.length > 0 ? `'${formatIssuePath(issue.path)}' ` : "";
  throw new Error(`Scenario '${scenarioPath}': ${where}${issue.message}`);
}
