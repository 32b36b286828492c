import { ConfigMalformedError } from "../lib/errors.js";
import { buildPathPreset, buildPreset } from "../lib/presets.js";

export const NEW_SHELL_POLICIES = ["auto-setup", "notify", "ignore"] as const;

export type NewShellPolicy = typeof NEW_SHELL_POLICIES[number];

export interface GeneralPrefs {
  commandStyle: string;
  folderStyle: string;
}

/**
 * `onNewShellPolicy` keeps whatever string the file holds; the wizard only
 * ever writes one of NEW_SHELL_POLICIES.
 */
export interface ShellPrefs {
  defaultShell: string;
  enabledShells: ReadonlySet<string>;
  onNewShellPolicy: string;
}

export interface MappingSelections {
  shell: string;
  commandStyle: string;
  folderStyle: string;
  onNewShell: NewShellPolicy;
}

/** On-disk layout of config.yaml. */
export interface MappingRecord {
  general: {
    command_style: string;
    folder_style: string;
  };
  shells: {
    default: string;
    enabled: string[];
    on_new_shell: string;
  };
  commands: Record<string, string>;
  paths: Record<string, string>;
}

export interface MappingStoreProps {
  commandMap: Record<string, string>;
  pathMap: Record<string, string>;
  generalPrefs: GeneralPrefs;
  shellPrefs: {
    defaultShell: string;
    enabledShells: Iterable<string>;
    onNewShellPolicy: string;
  };
}

export class MappingStore {
  readonly commandMap: Readonly<Record<string, string>>;
  readonly pathMap: Readonly<Record<string, string>>;
  readonly generalPrefs: Readonly<GeneralPrefs>;
  readonly shellPrefs: Readonly<ShellPrefs>;

  constructor(props: MappingStoreProps) {
    this.commandMap = Object.freeze({ ...props.commandMap });
    this.pathMap = Object.freeze({ ...props.pathMap });
    this.generalPrefs = Object.freeze({ ...props.generalPrefs });
    this.shellPrefs = Object.freeze({
      defaultShell: props.shellPrefs.defaultShell,
      enabledShells: new Set(props.shellPrefs.enabledShells),
      onNewShellPolicy: props.shellPrefs.onNewShellPolicy,
    });
  }

  /** Builds the store the wizard commits from its four selections. */
  static fromSelections(selections: MappingSelections) {
    return new MappingStore({
      commandMap: buildPreset(selections.commandStyle),
      pathMap: buildPathPreset(selections.folderStyle),
      generalPrefs: {
        commandStyle: selections.commandStyle,
        folderStyle: selections.folderStyle,
      },
      shellPrefs: {
        defaultShell: selections.shell,
        enabledShells: [selections.shell],
        onNewShellPolicy: selections.onNewShell,
      },
    });
  }

  static fromRecord(raw: unknown, sourcePath?: string) {
    const fail = (reason: string): never => {
      throw new ConfigMalformedError(reason, sourcePath);
    };

    if (!isRecord(raw)) return fail("expected a mapping at the top level");
    const general = isRecord(raw.general) ? raw.general : fail("missing [general] section");
    const shells = isRecord(raw.shells) ? raw.shells : fail("missing [shells] section");

    const enabled = Array.isArray(shells.enabled) ? shells.enabled : fail("shells.enabled must be a list");
    const enabledShells = enabled.map((entry, index) =>
      typeof entry === "string" ? entry : fail(`shells.enabled[${index}] must be a string`)
    );

    return new MappingStore({
      commandMap: requireStringMap(raw.commands, "commands", fail),
      pathMap: requireStringMap(raw.paths, "paths", fail),
      generalPrefs: {
        commandStyle: requireString(general, "command_style", "general", fail),
        folderStyle: requireString(general, "folder_style", "general", fail),
      },
      shellPrefs: {
        // an empty `default:` parses as null; init then detects the shell
        defaultShell: shells.default === null ? "" : requireString(shells, "default", "shells", fail),
        enabledShells,
        onNewShellPolicy: requireString(shells, "on_new_shell", "shells", fail),
      },
    });
  }

  toRecord(): MappingRecord {
    return {
      general: {
        command_style: this.generalPrefs.commandStyle,
        folder_style: this.generalPrefs.folderStyle,
      },
      shells: {
        default: this.shellPrefs.defaultShell,
        enabled: [...this.shellPrefs.enabledShells],
        on_new_shell: this.shellPrefs.onNewShellPolicy,
      },
      commands: { ...this.commandMap },
      paths: { ...this.pathMap },
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(
  node: Record<string, unknown>,
  key: string,
  section: string,
  fail: (reason: string) => never
): string {
  const value = node[key];
  return typeof value === "string" ? value : fail(`${section}.${key} must be a string`);
}

function requireStringMap(
  value: unknown,
  section: string,
  fail: (reason: string) => never
): Record<string, string> {
  // a bare `paths:` key in a hand-edited file parses as null
  if (value === null) return {};
  if (value === undefined) return fail(`missing [${section}] section`);
  if (!isRecord(value)) return fail(`[${section}] must be a mapping`);
  const entries = Object.entries(value).map(([key, entry]): [string, string] =>
    typeof entry === "string" ? [key, entry] : fail(`${section}.${key} must be a string`)
  );
  return Object.fromEntries(entries);
}
