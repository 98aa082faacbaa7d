import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { FormDefinitionError } from "../../src/errors.js";
import { buildForm, buildQuestion, parseFormDefinition, readFormDefinition } from "../../src/formDefinition.js";
import type { FormDefinition } from "../../src/formTypes.js";
import { IntegerQuestion, INT64_MAX } from "../../src/questions/integerQuestion.js";
import { MultipleChoiceQuestion } from "../../src/questions/multipleChoiceQuestion.js";
import { TextQuestion } from "../../src/questions/textQuestion.js";
import { OutputCapture, scriptedInput } from "../helpers/test-utils.js";

const fixture = (name: string): string => fileURLToPath(new URL(`../fixtures/forms/${name}`, import.meta.url));

function definitionError(data: unknown): FormDefinitionError {
  try {
    parseFormDefinition(data);
  } catch (err) {
    if (err instanceof FormDefinitionError) return err;
    throw err;
  }
  throw new Error("expected the definition to be rejected");
}

describe("parseFormDefinition", () => {
  it("accepts every question type", () => {
    const definition = {
      id: "all",
      title: "All types",
      questions: [
        { type: "text", id: "t", title: "T", characterLimit: 12, pattern: "[a-z]+" },
        { type: "integer", id: "i", title: "I", min: -5, max: "5" },
        { type: "boolean", id: "b", title: "B", default: false },
        { type: "multipleChoice", id: "m", title: "M", choices: ["x", "y"] },
        { type: "checkboxes", id: "c", title: "C", choices: ["x"], requirement: { questionId: "b", value: true } },
      ],
    };
    expect(parseFormDefinition(definition)).toEqual(definition);
  });

  it("reports a missing property at the root", () => {
    const error = definitionError({ id: "x", title: "X" });
    expect(error.code).toBe("DEFINITION_INVALID");
    expect(error.messages).toContain("(root): must have required property 'questions'");
  });

  it("reports nested paths with dots", () => {
    const error = definitionError({ id: "x", title: "X", questions: [{ type: "text", id: "Bad Id", title: "T" }] });
    expect(error.messages).toContain('questions.0.id: must match pattern "^[a-z0-9_-]+$"');
  });

  it("rejects properties that do not belong to the question type", () => {
    expect(() =>
      parseFormDefinition({ id: "x", title: "X", questions: [{ type: "text", id: "t", title: "T", choices: ["a"] }] }),
    ).toThrow(FormDefinitionError);
  });

  it("rejects choice lists that are empty or repeat a label", () => {
    expect(() =>
      parseFormDefinition({ id: "x", title: "X", questions: [{ type: "checkboxes", id: "c", title: "C", choices: [] }] }),
    ).toThrow(FormDefinitionError);
    expect(() =>
      parseFormDefinition({
        id: "x",
        title: "X",
        questions: [{ type: "multipleChoice", id: "m", title: "M", choices: ["a", "a"] }],
      }),
    ).toThrow(FormDefinitionError);
  });

  it("rejects an invalid regular expression", () => {
    expect(() =>
      parseFormDefinition({ id: "x", title: "X", questions: [{ type: "text", id: "t", title: "T", pattern: "(" }] }),
    ).toThrow(FormDefinitionError);
  });

  it("rejects duplicate ids, dangling requirements and inverted bounds", () => {
    const error = definitionError({
      id: "x",
      title: "X",
      questions: [
        { type: "text", id: "a", title: "A" },
        { type: "text", id: "a", title: "A again" },
        { type: "text", id: "b", title: "B", requirement: { questionId: "zz", value: "yes" } },
        { type: "integer", id: "n", title: "N", min: 5, max: 1 },
      ],
    });
    expect(error.messages).toEqual([
      'questions: duplicate id "a"',
      'b.requirement: unknown question "zz"',
      "n: min is greater than max",
    ]);
    expect(error.message).toBe(
      'Invalid form definition "x": questions: duplicate id "a"; b.requirement: unknown question "zz"; n: min is greater than max',
    );
  });

  it("rejects a question that requires itself", () => {
    const error = definitionError({
      id: "x",
      title: "X",
      questions: [{ type: "boolean", id: "a", title: "A", requirement: { questionId: "a", value: true } }],
    });
    expect(error.messages).toEqual(['a.requirement: "a" is not asked before "a"']);
  });

  it("rejects a requirement on a later question", () => {
    const error = definitionError({
      id: "x",
      title: "X",
      questions: [
        { type: "text", id: "why", title: "Why?", requirement: { questionId: "agree", value: true } },
        { type: "boolean", id: "agree", title: "Agree?" },
      ],
    });
    expect(error.messages).toEqual(['why.requirement: "agree" is not asked before "why"']);
  });

  it("rejects integer bounds outside the signed 64-bit range", () => {
    const error = definitionError({
      id: "x",
      title: "X",
      questions: [
        { type: "integer", id: "big", title: "Big", max: "9999999999999999999" },
        { type: "integer", id: "small", title: "Small", min: "-9223372036854775809", max: 0 },
        { type: "integer", id: "edge", title: "Edge", min: "-9223372036854775808", max: "9223372036854775807" },
      ],
    });
    expect(error.messages).toEqual([
      "big: max is outside the signed 64-bit range",
      "small: min is outside the signed 64-bit range",
    ]);
  });
});

describe("readFormDefinition", () => {
  it("reads and validates a file", () => {
    const definition = readFormDefinition(fixture("survey.json"));
    expect(definition.id).toBe("survey");
    expect(definition.questions).toHaveLength(3);
  });

  it("wraps unreadable files in FormDefinitionError", () => {
    expect(() => readFormDefinition(fixture("missing.json"))).toThrow(/^Failed to read form definition .*missing\.json: /);
  });
});

describe("buildQuestion", () => {
  it("converts int64 bounds to bigint", () => {
    const question = buildQuestion({ type: "integer", id: "n", title: "N", min: "-12", max: "9223372036854775807" });
    expect(question).toBeInstanceOf(IntegerQuestion);
    expect(question).toMatchObject({ min: -12n, max: INT64_MAX });
  });

  it("carries the requirement and text options", () => {
    const question = buildQuestion({
      type: "text",
      id: "t",
      title: "T",
      characterLimit: 20,
      pattern: "[a-z]+",
      requirement: { questionId: "b", value: true },
    });
    expect(question).toBeInstanceOf(TextQuestion);
    expect(question).toMatchObject({ characterLimit: 20 });
    expect(question.getRequirement()).toEqual({ questionId: "b", value: true });
  });
});

describe("buildForm", () => {
  it("builds a runnable form from a definition", async () => {
    const definition: FormDefinition = readFormDefinition(fixture("survey.json"));
    const form = buildForm(definition, { input: scriptedInput(" Al\r\r\x1b[B\r"), output: new OutputCapture(), ansi: false });

    expect(form.id).toBe("survey");
    expect(form.getTitle()).toBe("Tea survey");
    expect(form.getTheme()).toEqual({ r: 0x33, g: 0x66, b: 0x99 });
    expect(form.getQuestion("tea")).toBeInstanceOf(MultipleChoiceQuestion);

    const result = await form.run();
    expect(result.formId).toBe("survey");
    expect(result.results.map((r) => [r.id, r.value])).toEqual([
      ["name", "Al"],
      ["likes_tea", true],
      ["tea", "Black"],
    ]);
  });
});
