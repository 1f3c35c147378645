import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ArtifactPathError } from "../../core/errors.js";

import { FsArtifactStore } from "./artifact-store.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeStore(extension = ".ts"): FsArtifactStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "jaunt-store-"));
  tempDirs.push(dir);
  return new FsArtifactStore(path.join(dir, "__generated__"), extension);
}

describe("FsArtifactStore", () => {
  it("writes nested modules and reads them back", async () => {
    const store = makeStore();

    const written = await store.write("text/slug", "export {};\n");

    expect(written).toBe(path.join(store.root, "text", "slug.ts"));
    expect(await store.read("text/slug")).toBe("export {};\n");
    expect(fs.readdirSync(path.join(store.root, "text"))).toEqual(["slug.ts"]);
  });

  it("reads missing artifacts as undefined", async () => {
    const store = makeStore();

    expect(await store.read("nothing/here")).toBeUndefined();
  });

  it("refuses module names that escape the root", () => {
    const store = makeStore();

    expect(() => store.pathFor("../outside")).toThrow(ArtifactPathError);
    expect(() => store.pathFor("../../etc/passwd")).toThrow(
      `Refusing to write ${path.resolve(store.root, "../../etc/passwd.ts")} outside ${store.root}.`,
    );
  });

  it("lists stored modules by name and removes them", async () => {
    const store = makeStore(".test.ts");
    await store.write("b", "b\n");
    await store.write("a/deep", "a\n");
    fs.writeFileSync(path.join(store.root, "notes.md"), "ignored\n");

    expect(await store.list()).toEqual(["a/deep", "b"]);
    expect(await store.remove("b")).toBe(true);
    expect(await store.remove("b")).toBe(false);
    expect(await store.list()).toEqual(["a/deep"]);
  });

  it("lists nothing before the root exists", async () => {
    expect(await makeStore().list()).toEqual([]);
  });
});
