import { promises as fs } from "node:fs";
import path from "node:path";
import { isDeepStrictEqual } from "node:util";
import { createTwoFilesPatch } from "diff";
import { consoleLogger, type Logger } from "../utils/logger";
import { errorMessage, isMissingFileError } from "../utils/errors";
import { AssetLoadError, PromptNotFoundError } from "./errors";
import {
  EMPTY_MANIFEST,
  LATEST,
  parseManifest,
  parsePromptAsset,
  versionFromFileName,
  type PromptManifest
} from "./manifest";
import { renderTemplate, type PromptTemplate, type TemplateVariables } from "./template";

export const MANIFEST_FILENAME = "manifest.yaml";

export interface PromptStoreOptions {
  /** Directory holding one sub-directory per prompt name. */
  assetsRoot: string;
  /** Defaults to `<assetsRoot>/manifest.yaml`. */
  manifestPath?: string;
  logger?: Logger;
}

export interface ChangelogEntry {
  date: string;
  author: string;
  changes: string;
}

export interface PromptComparison {
  version1: string;
  version2: string;
  contentChanged: boolean;
  fingerprint1: string;
  fingerprint2: string;
  tagsAdded: string[];
  tagsRemoved: string[];
  modelHintsChanged: boolean;
  /** Unified diff of the two bodies. */
  patch: string;
}

interface PromptSnapshot {
  readonly manifest: PromptManifest;
  readonly prompts: ReadonlyMap<string, ReadonlyMap<string, PromptTemplate>>;
}

const EMPTY_SNAPSHOT: PromptSnapshot = Object.freeze({ manifest: EMPTY_MANIFEST, prompts: new Map() });

/**
 * Versioned prompt templates loaded from a manifest and a directory of assets.
 *
 * Loaded state lives in one immutable snapshot. `load` and `reload` build the next snapshot
 * aside and swap it in with a single assignment, so a concurrent `resolve` sees either the
 * previous state or the new one, never a half-built cache. Loads are serialized.
 */
export class PromptStore {
  private snapshot: PromptSnapshot = EMPTY_SNAPSHOT;
  private assetsRoot: string;
  private manifestPath: string;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: PromptStoreOptions) {
    this.assetsRoot = path.resolve(options.assetsRoot);
    this.manifestPath = path.resolve(options.manifestPath ?? path.join(this.assetsRoot, MANIFEST_FILENAME));
    this.logger = options.logger ?? consoleLogger;
  }

  static async open(options: PromptStoreOptions): Promise<PromptStore> {
    const store = new PromptStore(options);
    await store.load();
    return store;
  }

  async load(manifestPath: string = this.manifestPath, assetsRoot: string = this.assetsRoot): Promise<void> {
    this.manifestPath = path.resolve(manifestPath);
    this.assetsRoot = path.resolve(assetsRoot);
    const locations = { manifestPath: this.manifestPath, assetsRoot: this.assetsRoot };

    const run = this.queue.then(async () => {
      this.snapshot = await this.readSnapshot(locations.manifestPath, locations.assetsRoot);
    });
    // The caller gets the failure through `run`; the queue only orders loads.
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Discards everything loaded and reads the manifest and assets again from the last locations. */
  reload(): Promise<void> {
    return this.load();
  }

  /** Drops all loaded templates; the store resolves nothing until the next `load`. */
  clear(): void {
    this.snapshot = EMPTY_SNAPSHOT;
  }

  resolve(name: string, version?: string): PromptTemplate {
    const { manifest, prompts } = this.snapshot;
    const versions = prompts.get(name);
    if (!versions) {
      throw new PromptNotFoundError(`Prompt '${name}' not found`, name);
    }

    let target = version;
    if (target === undefined || target === LATEST) {
      target = manifest.prompts[name]?.latest || greatestVersion(versions.keys());
      if (target === undefined) {
        throw new PromptNotFoundError(`No versions found for prompt '${name}'`, name);
      }
    }

    const template = versions.get(target);
    if (!template) {
      throw new PromptNotFoundError(`Version '${target}' not found for prompt '${name}'`, name, target);
    }
    return template;
  }

  render(template: PromptTemplate, variables: TemplateVariables = {}): string {
    return renderTemplate(template, variables);
  }

  /** Resolves several versions at once, e.g. the arms of an A/B test. */
  variants(name: string, versions: readonly string[]): PromptTemplate[] {
    return versions.map((version) => this.resolve(name, version));
  }

  listPrompts(): string[] {
    return [...this.snapshot.prompts.keys()];
  }

  listVersions(name: string): string[] {
    return [...this.versionsOf(name).keys()].sort();
  }

  changelog(name: string): Record<string, ChangelogEntry> {
    const versions = this.versionsOf(name);
    const entries: Record<string, ChangelogEntry> = {};
    for (const version of [...versions.keys()].sort()) {
      const template = versions.get(version);
      if (template) {
        entries[version] = { date: template.date, author: template.author, changes: template.changes };
      }
    }
    return entries;
  }

  compare(name: string, version1: string, version2: string): PromptComparison {
    const first = this.resolve(name, version1);
    const second = this.resolve(name, version2);

    return {
      version1,
      version2,
      contentChanged: first.body !== second.body,
      fingerprint1: first.fingerprint,
      fingerprint2: second.fingerprint,
      tagsAdded: unique(second.tags.filter((tag) => !first.tags.includes(tag))),
      tagsRemoved: unique(first.tags.filter((tag) => !second.tags.includes(tag))),
      modelHintsChanged: !isDeepStrictEqual(first.modelHints, second.modelHints),
      patch: createTwoFilesPatch(
        `${name}/${first.version}`,
        `${name}/${second.version}`,
        `${first.body}\n`,
        `${second.body}\n`
      )
    };
  }

  /** Prompt-independent settings declared in the manifest. */
  manifestSettings(): Readonly<Record<string, unknown>> {
    return this.snapshot.manifest.settings;
  }

  private versionsOf(name: string): ReadonlyMap<string, PromptTemplate> {
    const versions = this.snapshot.prompts.get(name);
    if (!versions) {
      throw new PromptNotFoundError(`Prompt '${name}' not found`, name);
    }
    return versions;
  }

  private async readSnapshot(manifestPath: string, assetsRoot: string): Promise<PromptSnapshot> {
    const manifest = await this.readManifest(manifestPath);
    const prompts = new Map<string, ReadonlyMap<string, PromptTemplate>>();

    for (const name of Object.keys(manifest.prompts)) {
      const versions = await this.readVersions(name, path.join(assetsRoot, name));
      if (versions) {
        prompts.set(name, versions);
      }
    }

    return Object.freeze({ manifest, prompts });
  }

  private async readManifest(manifestPath: string): Promise<PromptManifest> {
    let text: string;
    try {
      text = await fs.readFile(manifestPath, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.warn(`No prompt manifest found at ${manifestPath}`);
        return EMPTY_MANIFEST;
      }
      throw error;
    }
    return parseManifest(text, manifestPath);
  }

  private async readVersions(name: string, directory: string): Promise<Map<string, PromptTemplate> | undefined> {
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (error) {
      if (!isMissingFileError(error)) {
        this.logger.warn(`Skipping prompt '${name}': ${errorMessage(error)}`);
      }
      return undefined;
    }

    const versions = new Map<string, PromptTemplate>();
    for (const entry of entries.sort()) {
      const version = versionFromFileName(entry);
      if (version === undefined) continue;

      const source = path.join(directory, entry);
      try {
        const text = await fs.readFile(source, "utf8");
        versions.set(version, parsePromptAsset(text, name, version, source));
      } catch (error) {
        const failure =
          error instanceof AssetLoadError ? error : new AssetLoadError(source, errorMessage(error), { cause: error });
        this.logger.error(failure.message);
      }
    }
    return versions;
  }
}

function greatestVersion(versions: Iterable<string>): string | undefined {
  return [...versions].sort().at(-1);
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/** Opens a store and resolves a single template. */
export async function loadPrompt(name: string, version: string | undefined, options: PromptStoreOptions): Promise<PromptTemplate> {
  const store = await PromptStore.open(options);
  return store.resolve(name, version);
}
