export { BooleanQuestion, FALSE_LETTERS, TRUE_LETTERS, parseBooleanAnswer } from "./booleanQuestion.js";
export type { BooleanQuestionOptions } from "./booleanQuestion.js";
export { CheckboxesQuestion } from "./checkboxesQuestion.js";
export { INT64_MAX, INT64_MIN, IntegerQuestion } from "./integerQuestion.js";
export type { IntegerQuestionOptions } from "./integerQuestion.js";
export { MultipleChoiceQuestion } from "./multipleChoiceQuestion.js";
export { Question, QUESTION_ID_PATTERN } from "./question.js";
export type { FormNavigator, OutputSink, RenderContext } from "./question.js";
export { DEFAULT_CHARACTER_LIMIT, TextQuestion } from "./textQuestion.js";
export type { TextQuestionOptions } from "./textQuestion.js";
