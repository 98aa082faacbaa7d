import * as fs from "node:fs";
import * as path from "node:path";
import type winston from "winston";
import { FormDefinitionError } from "./errors.js";
import { buildForm, parseFormDefinition, readFormDefinition, type BuildFormOptions } from "./formDefinition.js";
import type { FormDefinition } from "./formTypes.js";
import { getLogger } from "./logger.js";
import type { TerminalForm } from "./terminalForm.js";

export class FormRegistry {
  private forms = new Map<string, FormDefinition>();

  constructor(private readonly logger: winston.Logger = getLogger()) {}

  /** Validates and stores a definition, replacing one with the same id. */
  registerForm(definition: FormDefinition): void {
    const parsed = parseFormDefinition(definition);
    this.forms.set(parsed.id, parsed);
  }

  listForms(): FormDefinition[] {
    return [...this.forms.values()];
  }

  getForm(id: string): FormDefinition | undefined {
    return this.forms.get(id);
  }

  /**
   * Registers every `*.json` definition in `dir`. Files that fail to parse or
   * validate are logged and skipped. Returns the ids that were registered.
   */
  loadFormsFromDir(dir: string): string[] {
    if (!fs.existsSync(dir)) {
      this.logger.warn(`Forms directory not found at ${dir}`);
      return [];
    }

    const loaded: string[] = [];
    for (const file of fs.readdirSync(dir).sort()) {
      if (!file.endsWith(".json")) continue;
      try {
        const definition = readFormDefinition(path.join(dir, file));
        this.forms.set(definition.id, definition);
        loaded.push(definition.id);
        this.logger.info(`Registered form: ${definition.id} from ${file}`);
      } catch (err) {
        if (!(err instanceof FormDefinitionError)) throw err;
        this.logger.warn(`Failed to load form ${file}: ${err.message}`);
      }
    }
    return loaded;
  }

  createForm(formId: string, options: BuildFormOptions = {}): TerminalForm {
    const definition = this.forms.get(formId);
    if (!definition) throw new FormDefinitionError(`Form not found: ${formId}`);
    return buildForm(definition, options);
  }
}
