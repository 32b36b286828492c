export const MAPPING_STYLES = ["natural", "traditional", "verbose"] as const;

export type MappingStyle = typeof MAPPING_STYLES[number];

export function isMappingStyle(value: string): value is MappingStyle {
  return (MAPPING_STYLES as readonly string[]).includes(value);
}

/** Unrecognized styles fall back to `traditional`. */
export function resolveStyle(value: string): MappingStyle {
  return isMappingStyle(value) ? value : "traditional";
}

// semantic command -> real command
const COMMAND_PRESETS: Record<MappingStyle, ReadonlyArray<readonly [string, string]>> = {
  natural: [
    ["goto", "cd"],
    ["back", "cd .."],
    ["list", "ls -la"],
    ["delete", "rm -rf"],
    ["copy", "cp -r"],
    ["move", "mv"],
    ["install", "sudo pacman -S"],
    ["remove", "sudo pacman -R"],
    ["update", "sudo pacman -Syu"],
  ],
  verbose: [
    ["go-to", "cd"],
    ["go-back", "cd .."],
    ["list-files", "ls -la"],
    ["delete-file", "rm -rf"],
    ["copy-file", "cp -r"],
    ["move-file", "mv"],
    ["install-package", "sudo pacman -S"],
    ["remove-package", "sudo pacman -R"],
    ["update-system", "sudo pacman -Syu"],
  ],
  // identity: real commands map to themselves
  traditional: [
    ["cd", "cd"],
    ["ls", "ls"],
    ["rm", "rm"],
    ["cp", "cp"],
    ["mv", "mv"],
    ["pacman", "pacman"],
  ],
};

// virtual path -> real path
const PATH_PRESETS: Record<MappingStyle, ReadonlyArray<readonly [string, string]>> = {
  natural: [
    ["/apps", "/usr/bin"],
    ["/settings", "/etc"],
    ["/logs", "/var/log"],
  ],
  verbose: [
    ["/user/applications", "/usr/bin"],
    ["/configuration", "/etc"],
    ["/system-logs", "/var/log"],
  ],
  traditional: [],
};

export function buildPreset(style: string): Record<string, string> {
  return Object.fromEntries(COMMAND_PRESETS[resolveStyle(style)]);
}

export function buildPathPreset(style: string): Record<string, string> {
  return Object.fromEntries(PATH_PRESETS[resolveStyle(style)]);
}
