export type QuestionType = "text" | "integer" | "boolean" | "multipleChoice" | "checkboxes";

export type TextResult = { type: "text"; id: string; value: string };
export type IntegerResult = { type: "integer"; id: string; value: bigint };
export type BooleanResult = { type: "boolean"; id: string; value: boolean };
export type MultipleChoiceResult = { type: "multipleChoice"; id: string; value: string };
export type CheckboxesResult = { type: "checkboxes"; id: string; value: readonly string[] };

export type QuestionResult =
  | TextResult
  | IntegerResult
  | BooleanResult
  | MultipleChoiceResult
  | CheckboxesResult;

export type FormResult = {
  formId?: string;
  /** Unique per form instance. */
  runId: string;
  /** Answers of submitted questions, in configuration order. */
  results: readonly QuestionResult[];
  /** Ids of questions skipped because their requirement was not met. */
  skipped: readonly string[];
};

export type FormCallback = (result: FormResult) => void;

export type RequirementValue = string | number | bigint | boolean | readonly string[];

/**
 * The question is only asked when the question `questionId` was submitted
 * with a value equal to `value`.
 */
export type Requirement = {
  questionId: string;
  value: RequirementValue;
};

type QuestionDefinitionBase = {
  id: string;
  title: string;
  description?: string;
  requirement?: {
    questionId: string;
    value: string | number | boolean | string[];
  };
};

export type TextQuestionDefinition = QuestionDefinitionBase & {
  type: "text";
  characterLimit?: number;
  pattern?: string;
};

export type IntegerQuestionDefinition = QuestionDefinitionBase & {
  type: "integer";
  /** Numbers, or decimal strings for values outside the safe integer range. */
  min?: number | string;
  max?: number | string;
};

export type BooleanQuestionDefinition = QuestionDefinitionBase & {
  type: "boolean";
  default?: boolean;
};

export type MultipleChoiceQuestionDefinition = QuestionDefinitionBase & {
  type: "multipleChoice";
  choices: string[];
};

export type CheckboxesQuestionDefinition = QuestionDefinitionBase & {
  type: "checkboxes";
  choices: string[];
};

export type QuestionDefinition =
  | TextQuestionDefinition
  | IntegerQuestionDefinition
  | BooleanQuestionDefinition
  | MultipleChoiceQuestionDefinition
  | CheckboxesQuestionDefinition;

export type FormDefinition = {
  id: string;
  title: string;
  description?: string;
  /** "#rrggbb" */
  theme?: string;
  questions: QuestionDefinition[];
};
