import { CommitFailedError } from "../lib/errors.js";
import { MappingStore, type MappingSelections } from "./MappingStore.js";
import {
  OPTION_SETS,
  SELECTION_STEPS,
  isSelectionStep,
  nextStep,
  prevStep,
  type OptionSets,
  type SelectionStep,
  type StepOption,
  type WizardStep,
} from "./WizardStep.js";

export interface ConfigPersistence {
  save(store: MappingStore): Promise<void>;
}

export interface WizardSessionOptions {
  persistence: ConfigPersistence;
  optionSets?: OptionSets;
}

/**
 * Setup wizard state: the current step, one cursor per selection step and
 * the error left behind by a failed commit. All mutation goes through the
 * navigation methods; `advance()` on the summary step is the only one that
 * touches persistence.
 */
export class WizardSession {
  private step: WizardStep = "welcome";
  private readonly cursors: Record<SelectionStep, number>;
  private readonly persistence: ConfigPersistence;
  readonly optionSets: OptionSets;
  private commitError: string | undefined;
  private quitFlag = false;
  private committed: MappingStore | undefined;

  constructor(options: WizardSessionOptions) {
    this.persistence = options.persistence;
    this.optionSets = options.optionSets ?? OPTION_SETS;
    for (const step of SELECTION_STEPS) {
      if (this.optionSets[step].length === 0) {
        throw new Error(`Wizard step '${step}' needs at least one option`);
      }
    }
    this.cursors = {
      shell: 0,
      "command-style": 0,
      "folder-style": 0,
      "new-shell-behavior": 0,
    };
  }

  get currentStep() {
    return this.step;
  }

  get lastCommitError() {
    return this.commitError;
  }

  get quitRequested() {
    return this.quitFlag;
  }

  get isFinished() {
    return this.quitFlag || this.step === "done";
  }

  /** Store written by the successful commit, once the session is done. */
  get committedStore() {
    return this.committed;
  }

  cursor(step: SelectionStep) {
    return this.cursors[step];
  }

  optionsFor(step: SelectionStep): ReadonlyArray<StepOption> {
    return this.optionSets[step];
  }

  currentOptions(): ReadonlyArray<StepOption> {
    return isSelectionStep(this.step) ? this.optionsFor(this.step) : [];
  }

  selections(): MappingSelections {
    return {
      shell: this.selected("shell").value,
      commandStyle: this.selected("command-style").value,
      folderStyle: this.selected("folder-style").value,
      onNewShell: this.selected("new-shell-behavior").value,
    };
  }

  moveCursorUp() {
    this.moveCursor(-1);
  }

  moveCursorDown() {
    this.moveCursor(1);
  }

  async advance() {
    if (this.isFinished) return;
    if (this.step !== "summary") {
      this.step = nextStep(this.step);
      return;
    }
    await this.commit();
  }

  goBack() {
    if (this.quitFlag) return;
    this.commitError = undefined;
    this.step = prevStep(this.step);
  }

  quit() {
    this.quitFlag = true;
  }

  private selected<S extends SelectionStep>(step: S): OptionSets[S][number] {
    const options: OptionSets[S] = this.optionSets[step];
    return options[this.cursors[step]] ?? options[0];
  }

  private moveCursor(delta: 1 | -1) {
    if (this.quitFlag || !isSelectionStep(this.step)) return;
    const count = this.optionSets[this.step].length;
    this.cursors[this.step] = (this.cursors[this.step] + delta + count) % count;
  }

  private async commit() {
    const store = MappingStore.fromSelections(this.selections());
    try {
      await this.persistence.save(store);
    } catch (error) {
      this.commitError = new CommitFailedError(error).message;
      return;
    }
    this.commitError = undefined;
    this.committed = store;
    this.step = "done";
  }
}
