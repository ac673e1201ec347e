import { describe, expect, it } from "vitest";
import { ExternalToolError } from "../../src/errors.js";
import { NixStore } from "../../src/store/nix-store.js";
import type { CommandExecutor, Result } from "../../src/store/types.js";

type Responses = Record<string, Result<string, ExternalToolError>>;

function executor(responses: Responses): CommandExecutor & { seen: string[] } {
  const seen: string[] = [];
  return {
    seen,
    async run(command) {
      const key = command.join(" ");
      seen.push(key);
      const response = responses[key];
      if (!response) {
        return {
          ok: false,
          error: new ExternalToolError(command, 1, "unexpected command"),
        };
      }
      return response;
    },
  };
}

const ok = (value: string): Result<string, ExternalToolError> => ({
  ok: true,
  value,
});

describe("NixStore", () => {
  it("trims hash output", async () => {
    const exec = executor({
      "nix-store --query --hash /nix/store/aaa-hello": ok("sha256:0abc\n"),
    });
    const store = new NixStore(exec);
    await expect(store.queryHash("/nix/store/aaa-hello")).resolves.toEqual({
      ok: true,
      value: "sha256:0abc",
    });
  });

  it("reports missing paths as a failed result", async () => {
    const store = new NixStore(executor({}));
    const result = await store.queryHash("/nix/store/missing");
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.command).toEqual([
      "nix-store",
      "--query",
      "--hash",
      "/nix/store/missing",
    ]);
  });

  it("selects the reference depth flag", async () => {
    const exec = executor({
      "nix-store --query --references /nix/store/x.drv": ok(
        "/nix/store/a\n/nix/store/b.drv\n",
      ),
      "nix-store --query --requisites /nix/store/x.drv": ok(
        "/nix/store/c\n/nix/store/a\n/nix/store/b.drv\n/nix/store/x.drv\n",
      ),
    });
    const store = new NixStore(exec);

    await expect(store.queryReferences("/nix/store/x.drv", false)).resolves.toEqual([
      "/nix/store/a",
      "/nix/store/b.drv",
    ]);
    await expect(store.queryReferences("/nix/store/x.drv", true)).resolves.toEqual([
      "/nix/store/c",
      "/nix/store/a",
      "/nix/store/b.drv",
      "/nix/store/x.drv",
    ]);
  });

  it("returns no references for empty output", async () => {
    const store = new NixStore(
      executor({ "nix-store --query --references /nix/store/x.drv": ok("\n") }),
    );
    await expect(store.queryReferences("/nix/store/x.drv", false)).resolves.toEqual([]);
  });

  it("throws when the reference query fails", async () => {
    const store = new NixStore(executor({}));
    await expect(store.queryReferences("/nix/store/x.drv", false)).rejects.toThrow(
      ExternalToolError,
    );
  });

  it("parses the first derivation of derivation show", async () => {
    const json = JSON.stringify({
      "/nix/store/x-hello-2.12.drv": {
        name: "hello-2.12",
        env: { version: "2.12", pname: "hello", __json: 1 },
        outputs: {
          out: { path: "/nix/store/o-hello-2.12" },
          ca: { hashAlgo: "sha256", method: "nar" },
        },
      },
      "/nix/store/y-other.drv": { name: "other", env: {}, outputs: {} },
    });
    const store = new NixStore(
      executor({ "nix derivation show .#hello": ok(json) }),
    );

    await expect(store.showDerivation(".#hello")).resolves.toEqual({
      path: "/nix/store/x-hello-2.12.drv",
      name: "hello-2.12",
      environment: { version: "2.12", pname: "hello" },
      outputs: {
        out: { name: "out", path: "/nix/store/o-hello-2.12" },
        ca: { name: "ca", path: null },
      },
    });
    await expect(store.queryOutputs(".#hello")).resolves.toEqual({
      out: { name: "out", path: "/nix/store/o-hello-2.12" },
      ca: { name: "ca", path: null },
    });
  });

  it("rejects unreadable derivation output", async () => {
    const store = new NixStore(
      executor({
        "nix derivation show bad": ok("not json"),
        "nix derivation show empty": ok("{}"),
        "nix derivation show nameless": ok('{"/nix/store/z.drv": {"env": {}}}'),
      }),
    );
    await expect(store.showDerivation("bad")).rejects.toThrow(
      "Command 'nix derivation show bad' printed invalid JSON",
    );
    await expect(store.showDerivation("empty")).rejects.toThrow(
      "Command 'nix derivation show empty' returned no derivation",
    );
    await expect(store.showDerivation("nameless")).rejects.toThrow(
      "printed a malformed derivation for /nix/store/z.drv",
    );
  });

  it("reads locked flake metadata", async () => {
    const json = JSON.stringify({
      originalUrl: "github:example/hello",
      url: "github:example/hello/0123abcd",
      path: "/nix/store/src-source",
      revision: "0123abcd",
      locked: { rev: "0123abcd" },
    });
    const store = new NixStore(
      executor({ "nix flake metadata --json github:example/hello": ok(json) }),
    );
    await expect(store.flakeMetadata("github:example/hello")).resolves.toEqual({
      url: "github:example/hello/0123abcd",
      originalUrl: "github:example/hello",
      path: "/nix/store/src-source",
      revision: "0123abcd",
    });
  });
});
