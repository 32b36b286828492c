import type { WizardSession } from "../domain/WizardSession.js";

export type Intent = "quit" | "confirm" | "back" | "up" | "down" | "noop";

/**
 * A key event as emitted by readline's keypress stream. `kind` is only set
 * by sources that report repeats or releases; absent means a press.
 */
export interface KeyInput {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  kind?: "press" | "repeat" | "release";
}

export interface IntentSource {
  nextIntent(): Promise<Intent>;
  close?(): void;
}

export function intentFromKey(key: KeyInput): Intent {
  if (key.kind && key.kind !== "press") return "noop";
  if (key.ctrl) {
    return key.name === "c" ? "quit" : "noop";
  }
  switch (key.name) {
    case "q":
    case "escape":
      return "quit";
    case "return":
    case "enter":
      return "confirm";
    case "backspace":
      return "back";
    case "up":
    case "k":
      return "up";
    case "down":
    case "j":
      return "down";
    default:
      return "noop";
  }
}

export async function applyIntent(session: WizardSession, intent: Intent): Promise<void> {
  switch (intent) {
    case "quit":
      session.quit();
      return;
    case "confirm":
      await session.advance();
      return;
    case "back":
      session.goBack();
      return;
    case "up":
      session.moveCursorUp();
      return;
    case "down":
      session.moveCursorDown();
      return;
    case "noop":
      return;
  }
}

/**
 * Pulls intents one at a time until the session is done or quit. Each
 * intent is applied to completion before the next one is read.
 */
export async function driveWizard(
  session: WizardSession,
  source: IntentSource,
  render: (session: WizardSession) => void = () => {}
): Promise<void> {
  try {
    while (!session.isFinished) {
      render(session);
      const intent = await source.nextIntent();
      await applyIntent(session, intent);
    }
  } finally {
    source.close?.();
  }
}
