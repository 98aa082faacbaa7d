/**
 * Error codes for programmatic handling by host programs.
 */
export type TermformErrorCode =
  | "QUESTION_INVALID"
  | "FORM_INVALID_STATE"
  | "FORM_CANCELLED"
  | "TERMINAL_IO"
  | "DEFINITION_INVALID";

export class TermformError extends Error {
  readonly code: TermformErrorCode;

  constructor(message: string, code: TermformErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TermformError";
    this.code = code;
  }
}

/**
 * Thrown synchronously when a question's input contract is violated:
 * double submission, missing or invalid input, mutation after submission.
 * The message is prefixed with the question's type name.
 */
export class QuestionError extends TermformError {
  readonly questionType: string;
  readonly questionId: string;

  constructor(message: string, question: { readonly id: string; readonly constructor: { name: string } }) {
    super(`${question.constructor.name}: ${message}`, "QUESTION_INVALID");
    this.name = "QuestionError";
    this.questionType = question.constructor.name;
    this.questionId = question.id;
  }
}

export class FormError extends TermformError {
  constructor(message: string, form: { readonly constructor: { name: string } }) {
    super(`${form.constructor.name}: ${message}`, "FORM_INVALID_STATE");
    this.name = "FormError";
  }
}

export type CancelReason = "interrupt" | "end-of-input";

export class FormCancelledError extends TermformError {
  readonly reason: CancelReason;

  constructor(reason: CancelReason) {
    super(
      reason === "interrupt" ? "Form cancelled by interrupt key" : "Input ended before the form was completed",
      "FORM_CANCELLED",
    );
    this.name = "FormCancelledError";
    this.reason = reason;
  }
}

export class TerminalIOError extends TermformError {
  constructor(message: string, cause: unknown) {
    super(message, "TERMINAL_IO", { cause });
    this.name = "TerminalIOError";
  }
}

export class FormDefinitionError extends TermformError {
  readonly messages: string[];

  constructor(message: string, messages: string[] = []) {
    super(messages.length > 0 ? `${message}: ${messages.join("; ")}` : message, "DEFINITION_INVALID");
    this.name = "FormDefinitionError";
    this.messages = messages;
  }
}
