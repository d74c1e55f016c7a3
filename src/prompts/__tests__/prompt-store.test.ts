import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { PromptStore, loadPrompt } from "../prompt-store";
import { MissingVariableError, PromptNotFoundError, PromptStoreError } from "../errors";
import { computeFingerprint } from "../template";

const MANIFEST = `prompts:
  greeting:
    latest: v2
  farewell:
  empty:
settings:
  owner: docs
`;

function asset(body: string, header = "author: ada\ndate: \"2025-01-01\"\nchanges: first\ntags: [intro]"): string {
  return `---\n${header}\n---\n${body}\n`;
}

describe("PromptStore", () => {
  let root: string;
  let logger: { info: ReturnType<typeof vi.fn>; warn: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };

  async function put(name: string, file: string, content: string): Promise<void> {
    await mkdir(path.join(root, name), { recursive: true });
    await writeFile(path.join(root, name, file), content, "utf8");
  }

  function open(): Promise<PromptStore> {
    return PromptStore.open({ assetsRoot: root, logger });
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "prompt-store-"));
    logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await writeFile(path.join(root, "manifest.yaml"), MANIFEST, "utf8");
    await put("greeting", "v1.md", asset("Hi {name}"));
    await put(
      "greeting",
      "v2.md",
      asset("Hello {name}, welcome", "author: bob\ndate: \"2025-02-01\"\nchanges: warmer\ntags: [intro, warm]\nmodel_hints:\n  temperature: 0.7")
    );
    await put("farewell", "a.md", asset("Bye A"));
    await put("farewell", "b.md", asset("Bye B"));
    await put("farewell", "notes.txt", "ignored");
    await mkdir(path.join(root, "empty"), { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("resolves the manifest's latest version and renders it", async () => {
    const store = await open();
    const template = store.resolve("greeting");

    expect(template.version).toBe("v2");
    expect(store.render(template, { name: "Ada" })).toBe("Hello Ada, welcome");
  });

  it("treats no version, 'latest' and the declared latest as the same template", async () => {
    const store = await open();

    expect(store.resolve("greeting", "latest")).toBe(store.resolve("greeting"));
    expect(store.resolve("greeting", "v2")).toBe(store.resolve("greeting"));
  });

  it("falls back to the lexicographically greatest version when no latest is declared", async () => {
    const store = await open();

    expect(store.resolve("farewell").version).toBe("b");
    expect(store.resolve("farewell").body).toBe("Bye B");
  });

  it("fails for unknown prompts, unknown versions and prompts without versions", async () => {
    const store = await open();

    expect(() => store.resolve("nonexistent")).toThrow(PromptNotFoundError);
    expect(() => store.resolve("greeting", "vX")).toThrow("Version 'vX' not found for prompt 'greeting'");
    expect(() => store.resolve("empty")).toThrow("No versions found for prompt 'empty'");
    expect(() => store.listVersions("nonexistent")).toThrow(PromptNotFoundError);
    expect(() => store.changelog("nonexistent")).toThrow(PromptNotFoundError);
  });

  it("fails when the declared latest version was never loaded", async () => {
    await writeFile(path.join(root, "manifest.yaml"), "prompts:\n  greeting:\n    latest: v9\n", "utf8");
    const store = await open();

    expect(() => store.resolve("greeting")).toThrow("Version 'v9' not found for prompt 'greeting'");
  });

  it("falls back to the greatest version when latest is blank", async () => {
    await writeFile(
      path.join(root, "manifest.yaml"),
      "prompts:\n  greeting:\n    latest:\n    description: hi\n  farewell:\n    latest: \"\"\n",
      "utf8"
    );
    const store = await open();

    expect(store.resolve("greeting").version).toBe("v2");
    expect(store.resolve("farewell", "latest").version).toBe("b");
  });

  it("lists prompts in manifest order and versions sorted", async () => {
    const store = await open();

    expect(store.listPrompts()).toEqual(["greeting", "farewell", "empty"]);
    expect(store.listVersions("greeting")).toEqual(["v1", "v2"]);
    expect(store.listVersions("farewell")).toEqual(["a", "b"]);
    expect(store.listVersions("empty")).toEqual([]);
  });

  it("skips a prompt whose directory is missing", async () => {
    await writeFile(path.join(root, "manifest.yaml"), "prompts:\n  greeting:\n  ghost:\n", "utf8");
    const store = await open();

    expect(store.listPrompts()).toEqual(["greeting"]);
  });

  it("reads metadata and defaults missing header fields", async () => {
    await put("farewell", "c.md", "Bye C, no header\n");
    const store = await open();

    const v2 = store.resolve("greeting", "v2");
    expect(v2.author).toBe("bob");
    expect(v2.date).toBe("2025-02-01");
    expect(v2.changes).toBe("warmer");
    expect(v2.tags).toEqual(["intro", "warm"]);
    expect(v2.modelHints).toEqual({ temperature: 0.7 });
    expect(v2.source).toBe(path.join(root, "greeting", "v2.md"));

    const c = store.resolve("farewell", "c");
    expect(c.body).toBe("Bye C, no header");
    expect(c.author).toBe("unknown");
    expect(c.date).toBe("unknown");
    expect(c.changes).toBe("");
    expect(c.tags).toEqual([]);
    expect(c.modelHints).toEqual({});
  });

  it("fingerprints the trimmed body", async () => {
    const store = await open();
    const template = store.resolve("greeting", "v1");

    expect(template.fingerprint).toBe(computeFingerprint("Hi {name}"));
    expect(template.fingerprint).toHaveLength(12);
  });

  it("logs and skips a malformed asset while loading the rest", async () => {
    await put("greeting", "v3.md", "---\nauthor: [unclosed\n---\nBroken {name}\n");
    await put("farewell", "c.md", asset("Bye C", "tags: not-a-list"));
    const store = await open();

    expect(store.listVersions("greeting")).toEqual(["v1", "v2"]);
    expect(store.listVersions("farewell")).toEqual(["a", "b"]);
    expect(logger.error).toHaveBeenCalledTimes(2);
    expect(logger.error.mock.calls[0][0]).toContain(path.join(root, "greeting", "v3.md"));
    expect(logger.error.mock.calls[1][0]).toContain(path.join(root, "farewell", "c.md"));
  });

  it("warns and loads nothing when the manifest is missing", async () => {
    await rm(path.join(root, "manifest.yaml"));
    const store = await open();

    expect(store.listPrompts()).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(`No prompt manifest found at ${path.join(root, "manifest.yaml")}`);
  });

  it("fails the load when the manifest is invalid", async () => {
    await writeFile(path.join(root, "manifest.yaml"), "prompts: [greeting]\n", "utf8");

    await expect(open()).rejects.toThrow(PromptStoreError);
  });

  it("reads the manifest from an explicit location", async () => {
    const manifestPath = path.join(root, "alt-manifest.yaml");
    await writeFile(manifestPath, "prompts:\n  farewell:\n    latest: a\n", "utf8");
    const store = await PromptStore.open({ assetsRoot: root, manifestPath, logger });

    expect(store.listPrompts()).toEqual(["farewell"]);
    expect(store.resolve("farewell").version).toBe("a");
  });

  it("exposes the manifest settings", async () => {
    const store = await open();

    expect(store.manifestSettings()).toEqual({ owner: "docs" });
  });

  it("refuses to render with a missing variable", async () => {
    const store = await open();
    const template = store.resolve("greeting");

    expect(() => store.render(template, {})).toThrow(MissingVariableError);
    expect(() => store.render(template, { other: "x" })).toThrow("Missing value for {name} in prompt 'greeting' (v2)");
  });

  it("reports no differences when comparing a version with itself", async () => {
    const store = await open();
    const comparison = store.compare("greeting", "v2", "v2");

    expect(comparison.contentChanged).toBe(false);
    expect(comparison.fingerprint1).toBe(comparison.fingerprint2);
    expect(comparison.tagsAdded).toEqual([]);
    expect(comparison.tagsRemoved).toEqual([]);
    expect(comparison.modelHintsChanged).toBe(false);
    expect(comparison.patch).not.toContain("@@");
  });

  it("compares body, tags and model hints between versions", async () => {
    const store = await open();
    const comparison = store.compare("greeting", "v1", "v2");

    expect(comparison).toMatchObject({
      version1: "v1",
      version2: "v2",
      contentChanged: true,
      fingerprint1: computeFingerprint("Hi {name}"),
      fingerprint2: computeFingerprint("Hello {name}, welcome"),
      tagsAdded: ["warm"],
      tagsRemoved: [],
      modelHintsChanged: true
    });
    expect(comparison.patch).toContain("-Hi {name}");
    expect(comparison.patch).toContain("+Hello {name}, welcome");
  });

  it("returns the changelog per version", async () => {
    const store = await open();

    expect(store.changelog("greeting")).toEqual({
      v1: { date: "2025-01-01", author: "ada", changes: "first" },
      v2: { date: "2025-02-01", author: "bob", changes: "warmer" }
    });
  });

  it("resolves several variants at once", async () => {
    const store = await open();

    expect(store.variants("greeting", ["v1", "v2"]).map((template) => template.body)).toEqual([
      "Hi {name}",
      "Hello {name}, welcome"
    ]);
    expect(() => store.variants("greeting", ["v1", "v7"])).toThrow(PromptNotFoundError);
  });

  it("picks up added versions and drops removed ones on reload", async () => {
    const store = await open();
    await put("farewell", "c.md", asset("Bye C"));
    await rm(path.join(root, "farewell", "a.md"));

    await store.reload();

    expect(store.resolve("farewell", "c").body).toBe("Bye C");
    expect(store.resolve("farewell").version).toBe("c");
    expect(() => store.resolve("farewell", "a")).toThrow(PromptNotFoundError);
  });

  it("keeps serving the previous templates while a reload is in flight", async () => {
    const store = await open();
    const before = store.resolve("greeting");
    await put("greeting", "v2.md", asset("Hello again {name}"));

    const reloading = store.reload();
    expect(store.resolve("greeting")).toBe(before);
    expect(store.listVersions("greeting")).toEqual(["v1", "v2"]);

    await reloading;
    expect(store.resolve("greeting").body).toBe("Hello again {name}");
  });

  it("resolves nothing after clear", async () => {
    const store = await open();
    store.clear();

    expect(store.listPrompts()).toEqual([]);
    expect(() => store.resolve("greeting")).toThrow(PromptNotFoundError);
  });

  it("keeps separate stores independent", async () => {
    const first = await open();
    const otherRoot = await mkdtemp(path.join(tmpdir(), "prompt-store-other-"));
    try {
      await writeFile(path.join(otherRoot, "manifest.yaml"), "prompts:\n  greeting:\n", "utf8");
      await mkdir(path.join(otherRoot, "greeting"));
      await writeFile(path.join(otherRoot, "greeting", "v1.md"), "Hey {name}\n", "utf8");
      const second = await PromptStore.open({ assetsRoot: otherRoot, logger });

      expect(second.resolve("greeting").body).toBe("Hey {name}");
      expect(first.resolve("greeting").body).toBe("Hello {name}, welcome");
    } finally {
      await rm(otherRoot, { recursive: true, force: true });
    }
  });

  it("loads a single template with loadPrompt", async () => {
    const template = await loadPrompt("greeting", "v1", { assetsRoot: root, logger });

    expect(template.body).toBe("Hi {name}");
  });
});
