import { afterEach, beforeEach, vi } from "vitest";
import { removeTempDirs } from "./support/tempfs.js";

const BASE_ENV: NodeJS.ProcessEnv = { ...process.env };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.clearAllMocks();

  process.env = { ...BASE_ENV };
  process.env.NO_COLOR = "1";
  delete process.env.SEMANTIC_CONFIG_HOME;
  delete process.env.SEMANTIC_VERBOSE;
});

afterEach(async () => {
  await removeTempDirs();
});
