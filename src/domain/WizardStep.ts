import type { NewShellPolicy } from "./MappingStore.js";
import type { MappingStyle } from "../lib/presets.js";

export type WizardStep =
  | "welcome"
  | "shell"
  | "command-style"
  | "folder-style"
  | "new-shell-behavior"
  | "summary"
  | "done";

export type SelectionStep = Extract<WizardStep, "shell" | "command-style" | "folder-style" | "new-shell-behavior">;

export const SELECTION_STEPS: readonly SelectionStep[] = ["shell", "command-style", "folder-style", "new-shell-behavior"];

/** Steps shown in the progress indicator (welcome through summary). */
export const VISIBLE_STEP_COUNT = 6;

export function nextStep(step: WizardStep): WizardStep {
  switch (step) {
    case "welcome":
      return "shell";
    case "shell":
      return "command-style";
    case "command-style":
      return "folder-style";
    case "folder-style":
      return "new-shell-behavior";
    case "new-shell-behavior":
      return "summary";
    case "summary":
      return "done";
    case "done":
      return "done";
  }
}

export function prevStep(step: WizardStep): WizardStep {
  switch (step) {
    case "welcome":
      return "welcome";
    case "shell":
      return "welcome";
    case "command-style":
      return "shell";
    case "folder-style":
      return "command-style";
    case "new-shell-behavior":
      return "folder-style";
    case "summary":
      return "new-shell-behavior";
    case "done":
      return "done";
  }
}

export function stepIndex(step: WizardStep): number {
  switch (step) {
    case "welcome":
      return 0;
    case "shell":
      return 1;
    case "command-style":
      return 2;
    case "folder-style":
      return 3;
    case "new-shell-behavior":
      return 4;
    case "summary":
      return 5;
    case "done":
      return 6;
  }
}

export function isSelectionStep(step: WizardStep): step is SelectionStep {
  return (SELECTION_STEPS as readonly WizardStep[]).includes(step);
}

export interface StepOption<T extends string = string> {
  value: T;
  description?: string;
}

export interface OptionSets {
  shell: ReadonlyArray<StepOption>;
  "command-style": ReadonlyArray<StepOption<MappingStyle>>;
  "folder-style": ReadonlyArray<StepOption<MappingStyle>>;
  "new-shell-behavior": ReadonlyArray<StepOption<NewShellPolicy>>;
}

export const OPTION_SETS: OptionSets = {
  shell: [{ value: "fish" }, { value: "bash" }, { value: "zsh" }],
  "command-style": [
    { value: "natural", description: "goto, list, install, delete" },
    { value: "traditional", description: "cd, ls, pacman, rm" },
    { value: "verbose", description: "go-to, list-files, install-package" },
  ],
  "folder-style": [
    { value: "natural", description: "/apps, /settings, /logs" },
    { value: "traditional", description: "/usr/bin, /etc, /var/log" },
    { value: "verbose", description: "/user/applications, /configuration" },
  ],
  "new-shell-behavior": [
    { value: "auto-setup", description: "Automatically configure new shells" },
    { value: "notify", description: "Notify when a new shell is detected" },
    { value: "ignore", description: "Do nothing" },
  ],
};
