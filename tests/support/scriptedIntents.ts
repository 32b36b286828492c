import type { Intent, IntentSource } from "../../src/lib/intents.js";

/** Replays a fixed list of intents, then quits. */
export class ScriptedIntentSource implements IntentSource {
  private readonly queue: Intent[];
  closed = false;
  pulled = 0;

  constructor(intents: Intent[]) {
    this.queue = [...intents];
  }

  async nextIntent(): Promise<Intent> {
    this.pulled += 1;
    return this.queue.shift() ?? "quit";
  }

  close() {
    this.closed = true;
  }
}
