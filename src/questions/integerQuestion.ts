import { QuestionError } from "../errors.js";
import type { IntegerResult } from "../formTypes.js";
import { getButton } from "../navigation.js";
import { readKey } from "../rawInput.js";
import { Question, type RenderContext } from "./question.js";

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export type IntegerQuestionOptions = {
  min?: bigint | number;
  max?: bigint | number;
};

/**
 * A whole number question, optionally bounded. Without bounds any signed
 * 64-bit value is accepted.
 */
export class IntegerQuestion extends Question {
  readonly type = "integer" as const;
  readonly min: bigint;
  readonly max: bigint;

  private negative = false;
  private magnitude = 0n;

  constructor(id: string, title: string, description = "", options: IntegerQuestionOptions = {}) {
    super(id, title, description);
    this.min = this.toInt64(options.min ?? INT64_MIN, "min");
    this.max = this.toInt64(options.max ?? INT64_MAX, "max");
    if (this.min > this.max) {
      throw new QuestionError(`Invalid bounds, min ${this.min} is greater than max ${this.max}.`, this);
    }
  }

  resetState(): void {
    this.assertNotSubmitted("reset state");
    this.negative = false;
    this.magnitude = 0n;
  }

  setInput(value: bigint | number): void {
    this.assertNotSubmitted("set input");
    const number = typeof value === "bigint" ? value : this.fromNumber(value);
    if (!this.inBounds(number)) {
      throw new QuestionError(`Cannot set input, input is not in set bounds (${this.min}-${this.max}).`, this);
    }
    this.negative = number < 0n;
    this.magnitude = this.negative ? -number : number;
  }

  getInput(): bigint {
    return this.negative ? -this.magnitude : this.magnitude;
  }

  appendDigit(digit: number): void {
    this.assertNotSubmitted("append digit");
    if (!Number.isInteger(digit) || digit < 0 || digit > 9) {
      throw new QuestionError(`Cannot append digit, ${digit} is not a decimal digit.`, this);
    }
    const next = this.magnitude * 10n + BigInt(digit);
    const limit = this.negative ? -INT64_MIN : INT64_MAX;
    // past the 64-bit range the magnitude snaps to the upper bound
    this.magnitude = next > limit ? absolute(this.max) : next;
  }

  setNegative(): void {
    this.assertNotSubmitted("set sign");
    this.negative = true;
  }

  /** Drops the last digit, or clears the sign once no digits are left. */
  backspace(): void {
    this.assertNotSubmitted("delete digit");
    if (this.magnitude === 0n) {
      this.negative = false;
    } else {
      this.magnitude /= 10n;
    }
  }

  inBounds(value: bigint = this.getInput()): boolean {
    return value >= this.min && value <= this.max;
  }

  toResult(): IntegerResult {
    return Object.freeze({ type: this.type, id: this.id, value: this.getInput() });
  }

  async render(context: RenderContext): Promise<void> {
    const { style } = context;
    for (;;) {
      const typed = `${this.negative ? "-" : " "}${this.magnitude}`;
      const range =
        (this.min === INT64_MIN ? "" : ` from ${this.min}`) + (this.max === INT64_MAX ? "" : ` to ${this.max}`);
      this.draw(
        context,
        this.panel(style, ["[ENTER]: Submit"]),
        style.gray(`Enter a number${range}: `) + (this.inBounds() ? style.gray(typed) : style.red(typed)),
      );

      const code = await readKey(context.input);
      const button = getButton(code);
      if (button === "numeral") {
        this.appendDigit(code - 48);
      } else if (code === 45) {
        this.setNegative();
      } else if (button === "backspace") {
        this.backspace();
      } else if (button === "submit" && this.inBounds()) {
        this.submit(context.navigator);
        return;
      }
    }
  }

  protected validateSubmission(): void {
    if (!this.inBounds()) {
      throw new QuestionError(`Cannot submit, input is not in set bounds (${this.min}-${this.max}).`, this);
    }
  }

  private toInt64(value: bigint | number, name: string): bigint {
    const number = typeof value === "bigint" ? value : this.fromNumber(value);
    if (number < INT64_MIN || number > INT64_MAX) {
      throw new QuestionError(`Invalid ${name} ${number}, outside the signed 64-bit range.`, this);
    }
    return number;
  }

  private fromNumber(value: number): bigint {
    if (!Number.isSafeInteger(value)) {
      throw new QuestionError(`${value} is not a safe integer, pass a bigint instead.`, this);
    }
    return BigInt(value);
  }
}

function absolute(value: bigint): bigint {
  return value < 0n ? -value : value;
}
