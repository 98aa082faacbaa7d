import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import { FormCancelledError, FormError } from "../../src/errors.js";
import type { FormResult } from "../../src/formTypes.js";
import { BooleanQuestion } from "../../src/questions/booleanQuestion.js";
import { CheckboxesQuestion } from "../../src/questions/checkboxesQuestion.js";
import { IntegerQuestion } from "../../src/questions/integerQuestion.js";
import { MultipleChoiceQuestion } from "../../src/questions/multipleChoiceQuestion.js";
import type { Question } from "../../src/questions/question.js";
import { TextQuestion } from "../../src/questions/textQuestion.js";
import { RawTerminalInput } from "../../src/rawInput.js";
import { TerminalForm } from "../../src/terminalForm.js";
import { fakeTerminal, OutputCapture, scriptedInput } from "../helpers/test-utils.js";

function terminalForm(keys: string, questions: Question[], callback?: (result: FormResult) => void) {
  const output = new OutputCapture();
  const form = new TerminalForm({
    title: "Survey",
    description: "A few questions.",
    questions,
    callback,
    input: scriptedInput(keys),
    output,
    ansi: false,
  });
  return { form, output };
}

describe("TerminalForm", () => {
  it("shows the intro page and waits for a key", async () => {
    const { form, output } = terminalForm(" ", [new BooleanQuestion("ok", "OK?")]);
    await form.render();
    expect(output.chunks[0]).toBe("=== Survey ===\n| A few questions.\n\nPress any key to continue!\n");
    expect(form.getPage()).toBe(0);
  });

  it("collects text and integer answers in order", async () => {
    const callback = vi.fn<(result: FormResult) => void>();
    const { form } = terminalForm(
      " hi\r5\r",
      [
        new TextQuestion("greeting", "Greeting", "", { characterLimit: 10 }),
        new IntegerQuestion("rating", "Rating", "", { min: 0, max: 5 }),
      ],
      callback,
    );

    const result = await form.run();

    expect(result.results).toEqual([
      { type: "text", id: "greeting", value: "hi" },
      { type: "integer", id: "rating", value: 5n },
    ]);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith(result);
  });

  it("collects checkbox answers in configuration order", async () => {
    const { form } = terminalForm(" s ww \r", [new CheckboxesQuestion("letters", "Letters", "", ["A", "B", "C"])]);
    const result = await form.run();
    expect(result.results).toEqual([{ type: "checkboxes", id: "letters", value: ["A", "B"] }]);
  });

  it("reads boolean answers with their defaults", async () => {
    const { form } = terminalForm(" \rn\r", [
      new BooleanQuestion("first", "First?"),
      new BooleanQuestion("second", "Second?", "", { defaultChoice: false }),
    ]);
    const result = await form.run();
    expect(result.results.map((r) => r.value)).toEqual([true, false]);
  });

  describe("requirements", () => {
    function questions(): Question[] {
      return [
        new MultipleChoiceQuestion("agree", "Agree?", "", ["yes", "no"]),
        new TextQuestion("why", "Why?").setRequirement("agree", "yes"),
        new BooleanQuestion("more", "More?"),
      ];
    }

    it("skips a question whose requirement is not met without reading input", async () => {
      const { form } = terminalForm(" s\r\r", questions());
      const result = await form.run();
      expect(result.results).toEqual([
        { type: "multipleChoice", id: "agree", value: "no" },
        { type: "boolean", id: "more", value: true },
      ]);
      expect(result.skipped).toEqual(["why"]);
    });

    it("asks the question once the requirement is met", async () => {
      const { form } = terminalForm(" \rhey\r\r", questions());
      const result = await form.run();
      expect(result.results.map((r) => r.value)).toEqual(["yes", "hey", true]);
      expect(result.skipped).toEqual([]);
    });

    it("skips a question whose referenced question does not exist", async () => {
      const { form } = terminalForm(" ", [new TextQuestion("orphan", "Orphan").setRequirement("missing", "x")]);
      const result = await form.run();
      expect(result.results).toEqual([]);
      expect(result.skipped).toEqual(["orphan"]);
    });
  });

  it("cancels on the interrupt key and releases the terminal", async () => {
    const stream = fakeTerminal();
    stream.end(" h\x03");
    const exitHooks = process.listenerCount("exit");
    const form = new TerminalForm({
      title: "Survey",
      questions: [new TextQuestion("name", "Name")],
      input: new RawTerminalInput(stream),
      output: new OutputCapture(),
      ansi: false,
    });

    const error = await form.run().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FormCancelledError);
    expect(error).toMatchObject({ reason: "interrupt" });
    expect(stream.setRawMode.mock.calls).toEqual([[true], [false]]);
    expect(stream.listenerCount("data")).toBe(0);
    expect(process.listenerCount("exit")).toBe(exitHooks);
    expect(form.isSubmitted()).toBe(false);
  });

  it("releases the terminal when a host drives render until done", async () => {
    const stream = fakeTerminal();
    stream.end(" hi\r");
    const exitHooks = process.listenerCount("exit");
    const form = new TerminalForm({
      title: "Survey",
      questions: [new TextQuestion("greeting", "Greeting")],
      input: new RawTerminalInput(stream),
      output: new OutputCapture(),
      ansi: false,
    });

    await form.render();
    expect(process.listenerCount("exit")).toBe(exitHooks + 1);
    while (!form.isSubmitted()) {
      await form.render();
    }

    expect(form.toResult().results).toEqual([{ type: "text", id: "greeting", value: "hi" }]);
    expect(stream.setRawMode.mock.calls).toEqual([[true], [false]]);
    expect(stream.listenerCount("data")).toBe(0);
    expect(process.listenerCount("exit")).toBe(exitHooks);
  });

  it("releases the input when a rendered step fails", async () => {
    const stream = new PassThrough();
    stream.end(" ");
    const form = new TerminalForm({
      title: "Survey",
      questions: [new TextQuestion("name", "Name")],
      input: new RawTerminalInput(stream),
      output: new OutputCapture(),
      ansi: false,
    });
    await form.render();
    await expect(form.render()).rejects.toMatchObject({ reason: "end-of-input" });
    expect(stream.listenerCount("data")).toBe(0);
  });

  it("cancels when input ends early", async () => {
    const stream = new PassThrough();
    stream.end(" ab");
    const form = new TerminalForm({
      title: "Survey",
      questions: [new TextQuestion("name", "Name")],
      input: new RawTerminalInput(stream),
      output: new OutputCapture(),
      ansi: false,
    });
    await expect(form.run()).rejects.toMatchObject({ reason: "end-of-input" });
    expect(stream.listenerCount("data")).toBe(0);
  });

  it("refuses to render once done", async () => {
    const { form } = terminalForm(" ", []);
    await form.run();
    expect(form.isSubmitted()).toBe(true);
    await expect(form.render()).rejects.toBeInstanceOf(FormError);
  });

  it("clears the screen with an escape sequence when ANSI is on", async () => {
    const output = new OutputCapture();
    const form = new TerminalForm({
      title: "Survey",
      questions: [new BooleanQuestion("ok", "OK?")],
      input: scriptedInput(" \r"),
      output,
      ansi: true,
    });
    await form.run();
    expect(output.chunks[1].startsWith("\x1b[H\x1b[2J")).toBe(true);
  });
});
