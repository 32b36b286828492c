import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { MappingStore } from "../domain/MappingStore.js";
import type { ConfigPersistence } from "../domain/WizardSession.js";
import { ConfigMalformedError, ConfigUnreadableError, messageOf } from "../lib/errors.js";

const APP_DIR = "semantic";
const CONFIG_FILE = "config.yaml";

/** `<configRoot>/semantic`, with no lookups of its own. */
export function resolveConfigDir(configRoot: string) {
  return path.join(configRoot, APP_DIR);
}

/**
 * Picks the config root from an explicit environment: SEMANTIC_CONFIG_HOME,
 * then XDG_CONFIG_HOME, then `<home>/.config`.
 */
export function resolveConfigRoot(env: NodeJS.ProcessEnv, homeDir: string) {
  const override = env.SEMANTIC_CONFIG_HOME?.trim();
  if (override) return override;
  const xdg = env.XDG_CONFIG_HOME?.trim();
  if (xdg) return xdg;
  return path.join(homeDir, ".config");
}

export interface ConfigSource {
  readonly configPath: string;
  load(): Promise<MappingStore>;
}

export class ConfigStore implements ConfigSource, ConfigPersistence {
  readonly configDir: string;
  readonly configPath: string;

  constructor(configRoot: string) {
    this.configDir = resolveConfigDir(configRoot);
    this.configPath = path.join(this.configDir, CONFIG_FILE);
  }

  async load(): Promise<MappingStore> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, "utf8");
    } catch (error) {
      const reason = (error as NodeJS.ErrnoException).code === "ENOENT" ? "config file not found" : messageOf(error);
      throw new ConfigUnreadableError(this.configPath, reason, error);
    }

    let raw: unknown;
    try {
      raw = parseYaml(content);
    } catch (error) {
      throw new ConfigMalformedError(`invalid YAML: ${messageOf(error)}`, this.configPath, error);
    }
    return MappingStore.fromRecord(raw, this.configPath);
  }

  /** Writes beside the target and renames, so readers never see a partial file. */
  async save(store: MappingStore): Promise<void> {
    await fs.mkdir(this.configDir, { recursive: true });
    const tmpPath = path.join(this.configDir, `.${CONFIG_FILE}.${randomUUID()}.tmp`);
    const content = stringifyYaml(store.toRecord());
    try {
      await fs.writeFile(tmpPath, content, "utf8");
      await fs.rename(tmpPath, this.configPath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }
  }
}
