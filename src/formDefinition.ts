import * as fs from "node:fs";
import AjvModule, { type ErrorObject, type SchemaObject } from "ajv";
import addFormatsModule from "ajv-formats";
import { parseHexColor } from "./ansi.js";
import { FormDefinitionError, QuestionError } from "./errors.js";
import type { FormDefinition, IntegerQuestionDefinition, QuestionDefinition } from "./formTypes.js";
import { BooleanQuestion } from "./questions/booleanQuestion.js";
import { CheckboxesQuestion } from "./questions/checkboxesQuestion.js";
import { INT64_MAX, INT64_MIN, IntegerQuestion } from "./questions/integerQuestion.js";
import { MultipleChoiceQuestion } from "./questions/multipleChoiceQuestion.js";
import type { Question } from "./questions/question.js";
import { TextQuestion } from "./questions/textQuestion.js";
import { TerminalForm, type TerminalFormOptions } from "./terminalForm.js";

// ajv ships CommonJS; under Node's ESM loader the default import is module.exports
const ajv = new AjvModule.default({ allErrors: true, strict: false });
addFormatsModule.default(ajv);

const SCHEMA_URL = new URL("../schemas/formDefinition.schema.json", import.meta.url);

function loadSchema(): SchemaObject {
  const schema: SchemaObject = JSON.parse(fs.readFileSync(SCHEMA_URL, "utf-8"));
  return schema;
}

const validateDefinition = ajv.compile<FormDefinition>(loadSchema());

/**
 * Checks a parsed JSON document against the form definition schema plus the
 * rules a schema cannot express: unique question ids, requirements that point
 * at an earlier question of the form, and integer bounds in range and in order.
 */
export function parseFormDefinition(data: unknown): FormDefinition {
  if (!validateDefinition(data)) {
    const errors = validateDefinition.errors ?? [];
    throw new FormDefinitionError("Invalid form definition", errors.map(describeAjvError));
  }

  const messages: string[] = [];
  const positions = new Map<string, number>();
  data.questions.forEach((question, index) => {
    if (positions.has(question.id)) messages.push(`questions: duplicate id "${question.id}"`);
    else positions.set(question.id, index);
  });
  data.questions.forEach((question, index) => {
    const requirement = question.requirement;
    if (requirement) {
      const target = positions.get(requirement.questionId);
      if (target === undefined) {
        messages.push(`${question.id}.requirement: unknown question "${requirement.questionId}"`);
      } else if (target >= index) {
        messages.push(`${question.id}.requirement: "${requirement.questionId}" is not asked before "${question.id}"`);
      }
    }
    if (question.type === "integer") messages.push(...boundMessages(question));
  });
  if (messages.length > 0) {
    throw new FormDefinitionError(`Invalid form definition "${data.id}"`, messages);
  }
  return data;
}

function boundMessages(question: IntegerQuestionDefinition): string[] {
  const messages: string[] = [];
  const bound = (name: "min" | "max", fallback: bigint): bigint => {
    const value = question[name];
    if (value === undefined) return fallback;
    const number = typeof value === "number" && !Number.isFinite(value) ? null : BigInt(value);
    if (number === null || number < INT64_MIN || number > INT64_MAX) {
      messages.push(`${question.id}: ${name} is outside the signed 64-bit range`);
      return fallback;
    }
    return number;
  };
  const min = bound("min", INT64_MIN);
  const max = bound("max", INT64_MAX);
  if (min > max) messages.push(`${question.id}: min is greater than max`);
  return messages;
}

export function readFormDefinition(file: string): FormDefinition {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    throw new FormDefinitionError(`Failed to read form definition ${file}`, [err instanceof Error ? err.message : String(err)]);
  }
  return parseFormDefinition(data);
}

export function buildQuestion(definition: QuestionDefinition): Question {
  const question = createQuestion(definition);
  if (definition.requirement) {
    question.setRequirement(definition.requirement.questionId, definition.requirement.value);
  }
  return question;
}

function createQuestion(definition: QuestionDefinition): Question {
  const description = definition.description ?? "";
  switch (definition.type) {
    case "text":
      return new TextQuestion(definition.id, definition.title, description, {
        characterLimit: definition.characterLimit,
        pattern: definition.pattern,
      });
    case "integer":
      return new IntegerQuestion(definition.id, definition.title, description, {
        min: definition.min === undefined ? undefined : BigInt(definition.min),
        max: definition.max === undefined ? undefined : BigInt(definition.max),
      });
    case "boolean":
      return new BooleanQuestion(definition.id, definition.title, description, {
        defaultChoice: definition.default,
      });
    case "multipleChoice":
      return new MultipleChoiceQuestion(definition.id, definition.title, description, definition.choices);
    case "checkboxes":
      return new CheckboxesQuestion(definition.id, definition.title, description, definition.choices);
    default: {
      const unknown: never = definition;
      throw new FormDefinitionError(`Unknown question type in ${JSON.stringify(unknown)}`);
    }
  }
}

export type BuildFormOptions = Omit<TerminalFormOptions, "id" | "title" | "description" | "theme" | "questions">;

export function buildForm(definition: FormDefinition, options: BuildFormOptions = {}): TerminalForm {
  let questions: Question[];
  try {
    questions = definition.questions.map(buildQuestion);
  } catch (err) {
    if (err instanceof QuestionError) {
      throw new FormDefinitionError(`Invalid form definition "${definition.id}"`, [err.message]);
    }
    throw err;
  }
  return new TerminalForm({
    ...options,
    id: definition.id,
    title: definition.title,
    description: definition.description,
    theme: definition.theme === undefined ? undefined : parseHexColor(definition.theme),
    questions,
  });
}

function describeAjvError(error: ErrorObject): string {
  const path = normalizeAjvPath(error.instancePath);
  return `${path || "(root)"}: ${error.message ?? "validation error"}`;
}

function normalizeAjvPath(instancePath: string): string {
  if (!instancePath) return "";
  const noSlash = instancePath.replace(/^\//, "");
  return noSlash.replace(/\//g, ".");
}
