import { describe, expect, it } from "vitest";
import { MappingStore } from "../../src/domain/MappingStore.js";
import { ConfigStore } from "../../src/infrastructure/ConfigStore.js";
import { TRANSLATE_USAGE } from "../../src/application/TranslateCoordinator.js";
import { USAGE, buildProgram } from "../../src/program.js";
import { FakeKeyboard, FakeScreen, MockShellExecutor, createTempDir } from "../support/index.js";

async function setup(options: { isTTY?: boolean; env?: NodeJS.ProcessEnv } = {}) {
  const root = await createTempDir();
  const config = new ConfigStore(root);
  await config.save(MappingStore.fromSelections({
    shell: "zsh",
    commandStyle: "natural",
    folderStyle: "natural",
    onNewShell: "notify",
  }));

  const errors: string[] = [];
  const exitCodes: number[] = [];
  const screen = new FakeScreen();
  const shell = new MockShellExecutor();
  const program = buildProgram({
    env: { SEMANTIC_CONFIG_HOME: root, ...options.env },
    homeDir: "/home/test",
    input: new FakeKeyboard({ isTTY: options.isTTY ?? false }),
    output: screen,
    runner: shell,
    sink: { out: () => {}, err: line => errors.push(line) },
    setExitCode: code => exitCodes.push(code),
  });
  const run = (...argv: string[]) => program.parseAsync(argv, { from: "user" });
  return { config, errors, exitCodes, screen, shell, run };
}

describe("semantic CLI", () => {
  it("rejects an unknown first argument with the usage line", async () => {
    const { errors, exitCodes, shell, run } = await setup();

    await run("frobnicate");

    expect(errors).toEqual(["Unknown command: frobnicate", USAGE]);
    expect(exitCodes).toEqual([1]);
    expect(shell.calls()).toEqual([]);
  });

  it("passes option-like arguments after the token through to the real command", async () => {
    const { errors, exitCodes, shell, run } = await setup();

    await run("translate", "list", "-h", "/logs");

    expect(shell.calls()).toEqual([{ program: "ls", args: ["-la", "-h", "/var/log"] }]);
    expect(exitCodes).toEqual([0]);
    expect(errors).toEqual([]);
  });

  it("forwards the exit code of the translated command", async () => {
    const { exitCodes, shell, run } = await setup();
    shell.when("sudo", MockShellExecutor.exit(100));

    await run("translate", "install", "vim");

    expect(shell.calls()).toEqual([{ program: "sudo", args: ["pacman", "-S", "vim"] }]);
    expect(exitCodes).toEqual([100]);
  });

  it("exits 1 when translate has no token", async () => {
    const { errors, exitCodes, run } = await setup();

    await run("translate");

    expect(errors).toEqual([TRANSLATE_USAGE]);
    expect(exitCodes).toEqual([1]);
  });

  it("prints debug lines with --verbose before the subcommand", async () => {
    const { config, errors, run } = await setup();

    await run("--verbose", "translate", "goto", "/apps");

    expect(errors).toEqual([
      `[semantic] loaded ${config.configPath}`,
      "[semantic] goto → cd /usr/bin",
    ]);
  });

  it("turns on debug lines from SEMANTIC_VERBOSE", async () => {
    const { config, errors, run } = await setup({ env: { SEMANTIC_VERBOSE: "1" } });

    await run("translate", "goto");

    expect(errors).toEqual([`[semantic] loaded ${config.configPath}`, "[semantic] goto → cd"]);
  });

  it("writes init code for the configured shell", async () => {
    const { exitCodes, screen, run } = await setup();

    await run("init");

    expect(exitCodes).toEqual([0]);
    expect(screen.text().startsWith("# >>> semantic init >>>\n# Generated for zsh.")).toBe(true);
    expect(screen.text().endsWith("# <<< semantic init <<<\n")).toBe(true);
  });

  it("refuses to start the wizard without a terminal", async () => {
    const { errors, exitCodes, screen, run } = await setup();

    await run();

    expect(errors).toEqual([
      "The setup wizard needs an interactive terminal.",
      "Run `semantic` directly in a terminal, or use `semantic init` / `semantic translate`.",
    ]);
    expect(exitCodes).toEqual([1]);
    expect(screen.writes).toEqual([]);
  });
});
