import path from "node:path";
import type { MappingStore } from "../domain/MappingStore.js";
import { splitCommand } from "./translate.js";

export const SUPPORTED_SHELLS = ["fish", "bash", "zsh"] as const;

export type SupportedShell = typeof SUPPORTED_SHELLS[number];

const SENTINEL_BEGIN = "# >>> semantic init >>>";
const SENTINEL_END = "# <<< semantic init <<<";

// builtins that must run in the user's shell, not in a child process
const SHELL_BUILTINS = new Set(["cd", "pushd", "popd"]);

const PATH_HELPER = "__semantic_path";

interface AliasEntry {
  token: string;
  program: string;
  fixedArgs: string[];
}

export function isSupportedShell(value: string): value is SupportedShell {
  return (SUPPORTED_SHELLS as readonly string[]).includes(value);
}

export function detectShell(env: NodeJS.ProcessEnv): SupportedShell {
  const name = path.basename(env.SHELL ?? "");
  return isSupportedShell(name) ? name : "bash";
}

/** The configured default shell when set, otherwise the detected one. */
export function effectiveShell(store: MappingStore, env: NodeJS.ProcessEnv): string {
  const configured = store.shellPrefs.defaultShell.trim();
  return configured || detectShell(env);
}

export function generateInit(store: MappingStore, shell: string, executable = "semantic"): string {
  const entries = collectEntries(store.commandMap);
  const needsPathHelper = entries.some(entry => SHELL_BUILTINS.has(entry.program));
  const pathEntries = Object.entries(store.pathMap).sort(([a], [b]) => a.localeCompare(b));

  const body = shell === "fish"
    ? fishBody(entries, pathEntries, needsPathHelper, executable)
    : posixBody(entries, pathEntries, needsPathHelper, executable);

  const profile = shell === "fish" ? "semantic init | source" : `eval "$(semantic init)"`;
  return [
    SENTINEL_BEGIN,
    `# Generated for ${shell}. Load it from your shell profile with: ${profile}`,
    ...body,
    SENTINEL_END,
    "",
  ].join("\n");
}

function collectEntries(commandMap: Readonly<Record<string, string>>): AliasEntry[] {
  const entries: AliasEntry[] = [];
  for (const [token, realCommand] of Object.entries(commandMap)) {
    const [program, ...fixedArgs] = splitCommand(realCommand);
    if (!program || !isFunctionName(token)) continue;
    // identity mappings (cd -> cd) would shadow the real command with itself
    if (fixedArgs.length === 0 && program === token) continue;
    entries.push({ token, program, fixedArgs });
  }
  return entries.sort((a, b) => a.token.localeCompare(b.token));
}

function isFunctionName(token: string) {
  return /^[A-Za-z0-9_][A-Za-z0-9_.+:-]*$/.test(token);
}

function posixBody(
  entries: AliasEntry[],
  pathEntries: Array<[string, string]>,
  needsPathHelper: boolean,
  executable: string
): string[] {
  const lines: string[] = [];
  if (needsPathHelper) {
    lines.push(`${PATH_HELPER}() {`, `  case "$1" in`);
    for (const [alias, real] of pathEntries) {
      lines.push(`    ${shQuote(alias)}) printf '%s\\n' ${shQuote(real)} ;;`);
    }
    lines.push(`    *) printf '%s\\n' "$1" ;;`, "  esac", "}");
  }

  for (const entry of entries) {
    if (SHELL_BUILTINS.has(entry.program)) {
      const fixed = entry.fixedArgs.map(shQuote).join(" ");
      lines.push(
        `${entry.token}() {`,
        "  local __semantic_args=() __semantic_arg",
        `  for __semantic_arg in "$@"; do __semantic_args+=("$(${PATH_HELPER} "$__semantic_arg")"); done`,
        `  builtin ${entry.program}${fixed ? ` ${fixed}` : ""} "\${__semantic_args[@]}"`,
        "}"
      );
    } else {
      lines.push(`${entry.token}() { command ${shQuote(executable)} translate ${shQuote(entry.token)} "$@"; }`);
    }
  }
  return lines;
}

function fishBody(
  entries: AliasEntry[],
  pathEntries: Array<[string, string]>,
  needsPathHelper: boolean,
  executable: string
): string[] {
  const lines: string[] = [];
  if (needsPathHelper) {
    lines.push(`function ${PATH_HELPER}`, "    switch $argv[1]");
    for (const [alias, real] of pathEntries) {
      lines.push(`        case ${fishQuote(alias)}`, `            printf '%s\\n' ${fishQuote(real)}`);
    }
    lines.push("        case '*'", "            printf '%s\\n' $argv[1]", "    end", "end");
  }

  for (const entry of entries) {
    lines.push(`function ${entry.token}`);
    if (SHELL_BUILTINS.has(entry.program)) {
      const fixed = entry.fixedArgs.map(fishQuote).join(" ");
      lines.push(
        "    set -l __semantic_args",
        "    for __semantic_arg in $argv",
        `        set -a __semantic_args (${PATH_HELPER} $__semantic_arg)`,
        "    end",
        `    builtin ${entry.program}${fixed ? ` ${fixed}` : ""} $__semantic_args`
      );
    } else {
      lines.push(`    command ${fishQuote(executable)} translate ${fishQuote(entry.token)} $argv`);
    }
    lines.push("end");
  }
  return lines;
}

function shQuote(value: string) {
  if (/^[A-Za-z0-9_./:=+-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, "'\\''")}'`;
}

function fishQuote(value: string) {
  if (/^[A-Za-z0-9_./:=+-]+$/.test(value)) return value;
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}
