import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { describe, expect, it } from "vitest";
import config from "../../github-action/tsup.config.js";

function bundleOptions() {
  if (Array.isArray(config) || typeof config === "function") {
    throw new Error("expected a single static tsup config");
  }
  return config;
}

describe("action bundle", () => {
  it("provides require to the CommonJS dependencies of an ESM bundle", () => {
    const options = bundleOptions();
    expect(options.format).toEqual(["esm"]);
    const banner = options.banner;
    if (!banner || typeof banner === "function") {
      throw new Error("expected a static banner");
    }
    expect(banner.js).toBe(
      'import { createRequire } from "node:module"; const require = createRequire(import.meta.url);',
    );
  });

  it("points action.yml at the bundled entry", async () => {
    const options = bundleOptions();
    const raw = await fs.readFile(path.resolve("action.yml"), "utf8");
    const action = yaml.load(raw) as { runs?: { main?: string } };
    expect(action.runs?.main).toBe(`${options.outDir}/index.js`);
  });
});
