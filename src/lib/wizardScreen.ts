import pc from "picocolors";
import type { WizardSession } from "../domain/WizardSession.js";
import { VISIBLE_STEP_COUNT, stepIndex, type SelectionStep, type WizardStep } from "../domain/WizardStep.js";

const PROMPTS: Record<SelectionStep, string> = {
  shell: "Which shell do you use?",
  "command-style": "Pick a command style:",
  "folder-style": "Pick a folder style:",
  "new-shell-behavior": "When a new shell is installed:",
};

export function renderProgress(step: WizardStep): string {
  const current = stepIndex(step);
  const dots: string[] = [];
  for (let i = 0; i < VISIBLE_STEP_COUNT; i += 1) {
    if (i < current) dots.push(pc.green("●"));
    else if (i === current) dots.push(pc.bold(pc.cyan("●")));
    else dots.push(pc.gray("○"));
  }
  return dots.join(" ");
}

export function helpLine(step: WizardStep): string {
  switch (step) {
    case "welcome":
      return "Enter: continue  •  q: quit";
    case "summary":
      return "Enter: save config  •  Backspace: back  •  q: quit";
    default:
      return "↑/↓: select  •  Enter: continue  •  Backspace: back  •  q: quit";
  }
}

/** Full text of the wizard screen for the session's current step. */
export function renderWizardScreen(session: WizardSession, configPath: string): string {
  const step = session.currentStep;
  const lines = [renderProgress(step), ""];

  switch (step) {
    case "welcome":
      lines.push(...welcomeLines(configPath));
      break;
    case "shell":
    case "command-style":
    case "folder-style":
    case "new-shell-behavior":
      lines.push(...selectionLines(session, step));
      break;
    case "summary":
      lines.push(...summaryLines(session));
      break;
    case "done":
      break;
  }

  lines.push("", pc.dim(helpLine(step)));
  return lines.join("\n");
}

function welcomeLines(configPath: string) {
  return [
    pc.bold(pc.cyan("semantic")),
    "",
    "Welcome to the semantic setup wizard.",
    "",
    "This will configure how you interact with your system.",
    "You can change everything later in:",
    pc.yellow(`  ${configPath}`),
    "",
    pc.dim("Press Enter to get started."),
  ];
}

function selectionLines(session: WizardSession, step: SelectionStep) {
  const selected = session.cursor(step);
  const lines = [pc.bold(PROMPTS[step]), ""];
  session.optionsFor(step).forEach((option, index) => {
    const isSelected = index === selected;
    const marker = isSelected ? "  ▸ " : "    ";
    const description = option.description ? `  ${option.description}` : "";
    lines.push(
      isSelected
        ? pc.bgCyan(pc.black(`${marker}${pc.bold(option.value)}${description}`))
        : `${marker}${option.value}${pc.gray(description)}`
    );
  });
  return lines;
}

function summaryLines(session: WizardSession) {
  const selections = session.selections();
  const row = (label: string, value: string) => `${pc.gray(label.padEnd(18))}${pc.cyan(value)}`;
  const lines = [
    pc.bold("Review your choices:"),
    "",
    row("  Shell:", selections.shell),
    row("  Command style:", selections.commandStyle),
    row("  Folder style:", selections.folderStyle),
    row("  New shell:", selections.onNewShell),
    "",
    pc.dim("Press Enter to save, or Backspace to go back."),
  ];
  if (session.lastCommitError) {
    lines.push("", pc.bold(pc.red(session.lastCommitError)));
  }
  return lines;
}
