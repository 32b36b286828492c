import { emitKeypressEvents } from "node:readline";
import type { WizardSession } from "../domain/WizardSession.js";
import { intentFromKey, type Intent, type IntentSource, type KeyInput } from "../lib/intents.js";
import { renderWizardScreen } from "../lib/wizardScreen.js";

const ALT_SCREEN_ON = "\x1b[?1049h";
const ALT_SCREEN_OFF = "\x1b[?1049l";
const CLEAR = "\x1b[2J\x1b[H";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

/** The parts of a TTY read stream the wizard uses; `process.stdin` fits. */
export interface KeyboardInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode(mode: boolean): unknown;
}

export interface ScreenOutput {
  write(chunk: string): unknown;
}

/**
 * Keyboard intents from a raw-mode TTY plus full-screen rendering. Keys
 * pressed while an intent is being applied are queued, not dropped.
 */
export class TerminalWizardIO implements IntentSource {
  private readonly pending: Intent[] = [];
  private waiter: ((intent: Intent) => void) | undefined;
  private readonly wasRaw: boolean;
  private closed = false;

  constructor(
    private readonly input: KeyboardInput,
    private readonly output: ScreenOutput,
    private readonly configPath: string
  ) {
    if (!input.isTTY) {
      throw new Error("The setup wizard needs an interactive terminal.");
    }
    emitKeypressEvents(input);
    this.wasRaw = Boolean(input.isRaw);
    input.setRawMode(true);
    input.on("keypress", this.onKeypress);
    input.resume();
    output.write(ALT_SCREEN_ON + HIDE_CURSOR);
  }

  nextIntent(): Promise<Intent> {
    const queued = this.pending.shift();
    if (queued) return Promise.resolve(queued);
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  render = (session: WizardSession) => {
    this.output.write(CLEAR + renderWizardScreen(session, this.configPath) + "\n");
  };

  close() {
    if (this.closed) return;
    this.closed = true;
    this.input.removeListener("keypress", this.onKeypress);
    this.input.setRawMode(this.wasRaw);
    this.input.pause();
    this.output.write(SHOW_CURSOR + ALT_SCREEN_OFF);
  }

  private onKeypress = (_str: string | undefined, key: KeyInput | undefined) => {
    const intent = intentFromKey(key ?? {});
    if (intent === "noop") return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(intent);
    } else {
      this.pending.push(intent);
    }
  };
}
