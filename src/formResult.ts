import type { FormResult, QuestionResult, RequirementValue } from "./formTypes.js";

export function findResult(formResult: FormResult, id: string): QuestionResult | undefined {
  return formResult.results.find((result) => result.id === id);
}

/**
 * Compares a produced answer with a requirement's expected value. Integers compare
 * numerically, so a JSON number matches the bigint answer; checkbox answers match
 * an array with the same labels in the same order.
 */
export function resultMatches(result: QuestionResult, expected: RequirementValue): boolean {
  switch (result.type) {
    case "integer":
      if (typeof expected === "bigint") return result.value === expected;
      if (typeof expected === "number") return Number.isInteger(expected) && result.value === BigInt(expected);
      return false;
    case "checkboxes":
      if (typeof expected === "string" || typeof expected === "number" || typeof expected === "bigint" || typeof expected === "boolean") {
        return false;
      }
      return expected.length === result.value.length && expected.every((label, i) => label === result.value[i]);
    default:
      return result.value === expected;
  }
}

export type SerializedAnswer = string | number | boolean | string[];

/**
 * Plain JSON view of a form result. Integers become numbers when they fit in a
 * double without loss, decimal strings otherwise.
 */
export function serializeFormResult(formResult: FormResult): {
  formId?: string;
  runId: string;
  answers: Record<string, SerializedAnswer>;
  skipped: string[];
} {
  const answers: Record<string, SerializedAnswer> = {};
  for (const result of formResult.results) {
    switch (result.type) {
      case "integer": {
        const asNumber = Number(result.value);
        answers[result.id] = Number.isSafeInteger(asNumber) ? asNumber : result.value.toString();
        break;
      }
      case "checkboxes":
        answers[result.id] = [...result.value];
        break;
      default:
        answers[result.id] = result.value;
    }
  }
  return {
    formId: formResult.formId,
    runId: formResult.runId,
    answers,
    skipped: [...formResult.skipped],
  };
}
