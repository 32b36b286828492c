import { describe, expect, it } from "vitest";
import { WizardCoordinator } from "../../src/application/WizardCoordinator.js";
import { LoggingService, type LogSink } from "../../src/infrastructure/LoggingService.js";
import { buildPreset } from "../../src/lib/presets.js";
import { MemoryPersistence, ScriptedIntentSource, createConfigStore } from "../support/index.js";

function capture() {
  const out: string[] = [];
  const sink: LogSink = { out: line => out.push(line), err: () => {} };
  return { out, logger: new LoggingService(false, sink) };
}

describe("WizardCoordinator", () => {
  it("writes the chosen config and loads it back", async () => {
    const config = await createConfigStore();
    const { out, logger } = capture();
    const io = new ScriptedIntentSource([
      "confirm",
      "confirm", // fish
      "down", "confirm", // traditional commands
      "down", "confirm", // traditional folders
      "up", "confirm", // ignore
      "confirm",
    ]);

    const session = await new WizardCoordinator(config, config.configPath, logger).orchestrateWizard(io);

    expect(session.currentStep).toBe("done");
    expect(io.closed).toBe(true);
    expect(out).toEqual([
      `Config written to ${config.configPath}`,
      "Run `semantic init` to generate shell aliases.",
    ]);

    const loaded = await config.load();
    expect(loaded.commandMap).toEqual(buildPreset("traditional"));
    expect(loaded.pathMap).toEqual({});
    expect(loaded.shellPrefs.defaultShell).toBe("fish");
    expect(loaded.shellPrefs.onNewShellPolicy).toBe("ignore");
  });

  it("renders before every intent", async () => {
    const rendered: string[] = [];
    const io = Object.assign(new ScriptedIntentSource(["confirm", "back", "quit"]), {
      render: (session: { currentStep: string }) => rendered.push(session.currentStep),
    });
    const { logger } = capture();

    await new WizardCoordinator(new MemoryPersistence(), "/cfg/config.yaml", logger).orchestrateWizard(io);

    expect(rendered).toEqual(["welcome", "shell", "welcome"]);
  });

  it("prints nothing when the user quits", async () => {
    const persistence = new MemoryPersistence();
    const { out, logger } = capture();

    const session = await new WizardCoordinator(persistence, "/cfg/config.yaml", logger)
      .orchestrateWizard(new ScriptedIntentSource(["confirm", "quit"]));

    expect(session.quitRequested).toBe(true);
    expect(out).toEqual([]);
    expect(persistence.attempts).toBe(0);
  });
});
