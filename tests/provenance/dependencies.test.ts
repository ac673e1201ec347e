import { describe, expect, it } from "vitest";
import { ExternalToolError } from "../../src/errors.js";
import {
  isDerivationPath,
  resolveDependencies,
} from "../../src/provenance/dependencies.js";
import { FakeStore, recordingLogger, unit } from "../helpers/fake-store.js";

const ROOT = "/nix/store/root-app.drv";

function graphStore(): FakeStore {
  return new FakeStore({
    hashes: {
      "/nix/store/p1-source": "sha256:11",
      "/nix/store/p2-gcc.drv": "sha256:22",
      "/nix/store/p3-zlib.drv": "sha256:33",
      "/nix/store/p4-builder.sh": "sha256:44",
      [ROOT]: "sha256:00",
    },
    references: {
      [ROOT]: {
        direct: ["/nix/store/p1-source", "/nix/store/p2-gcc.drv", "/nix/store/p3-zlib.drv"],
        transitive: [
          "/nix/store/p4-builder.sh",
          "/nix/store/p1-source",
          "/nix/store/p3-zlib.drv",
          "/nix/store/p2-gcc.drv",
          ROOT,
        ],
      },
    },
    derivations: {
      "/nix/store/p2-gcc.drv": unit("/nix/store/p2-gcc.drv", "gcc-13.2.0", {}, {
        version: "13.2.0",
      }),
      "/nix/store/p3-zlib.drv": unit("/nix/store/p3-zlib.drv", "zlib", {}, {}),
      [ROOT]: unit(ROOT, "app", {}, { version: "1.0" }),
    },
  });
}

describe("isDerivationPath", () => {
  it("recognizes .drv paths", () => {
    expect(isDerivationPath("/nix/store/p2-gcc.drv")).toBe(true);
    expect(isDerivationPath("/nix/store/p1-source")).toBe(false);
    expect(isDerivationPath("/nix/store/p1-drv-tools")).toBe(false);
  });
});

describe("resolveDependencies", () => {
  it("keeps the order returned by the store", async () => {
    const { logger } = recordingLogger();
    const deps = await resolveDependencies(
      graphStore(),
      ROOT,
      { transitive: false },
      logger,
    );
    expect(deps.map((dep) => dep.uri)).toEqual([
      "/nix/store/p1-source",
      "/nix/store/p2-gcc.drv",
      "/nix/store/p3-zlib.drv",
    ]);
  });

  it("annotates derivations with name and version", async () => {
    const { logger } = recordingLogger();
    const deps = await resolveDependencies(
      graphStore(),
      ROOT,
      { transitive: false },
      logger,
    );
    expect(deps).toEqual([
      { uri: "/nix/store/p1-source", digest: { sha256: "11" } },
      {
        uri: "/nix/store/p2-gcc.drv",
        digest: { sha256: "22" },
        name: "gcc-13.2.0",
        annotations: { version: "13.2.0" },
      },
      { uri: "/nix/store/p3-zlib.drv", digest: { sha256: "33" }, name: "zlib" },
    ]);
    expect("annotations" in (deps[2] ?? {})).toBe(false);
  });

  it("walks the closure in transitive mode without reordering", async () => {
    const store = graphStore();
    const { logger } = recordingLogger();
    const deps = await resolveDependencies(
      store,
      ROOT,
      { transitive: true },
      logger,
    );
    expect(deps.map((dep) => dep.uri)).toEqual([
      "/nix/store/p4-builder.sh",
      "/nix/store/p1-source",
      "/nix/store/p3-zlib.drv",
      "/nix/store/p2-gcc.drv",
      ROOT,
    ]);
    expect(deps[4]).toEqual({
      uri: ROOT,
      digest: { sha256: "00" },
      name: "app",
      annotations: { version: "1.0" },
    });
    expect(store.calls[0]).toBe(`requisites ${ROOT}`);
  });

  it("does not deduplicate repeated references", async () => {
    const store = new FakeStore({
      hashes: { "/nix/store/p1-source": "sha256:11" },
      references: {
        [ROOT]: {
          direct: ["/nix/store/p1-source", "/nix/store/p1-source"],
          transitive: [],
        },
      },
    });
    const { logger } = recordingLogger();
    const deps = await resolveDependencies(store, ROOT, { transitive: false }, logger);
    expect(deps).toHaveLength(2);
  });

  it("fails when a referenced path has no hash", async () => {
    const store = new FakeStore({
      hashes: {},
      references: {
        [ROOT]: { direct: ["/nix/store/p1-source"], transitive: [] },
      },
    });
    const { logger } = recordingLogger();
    await expect(
      resolveDependencies(store, ROOT, { transitive: false }, logger),
    ).rejects.toThrow(ExternalToolError);
  });

  it("fails when the reference query fails", async () => {
    const { logger } = recordingLogger();
    await expect(
      resolveDependencies(
        new FakeStore({}),
        ROOT,
        { transitive: true },
        logger,
      ),
    ).rejects.toThrow(
      `Command 'nix-store --query --requisites ${ROOT}' exited with 1`,
    );
  });
});
