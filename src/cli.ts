#!/usr/bin/env tsx
import { Command, InvalidArgumentError } from "commander";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, resolve } from "node:path";
import { loadSettings } from "./config/settings";
import { Orchestrator } from "./orchestrator";
import type { ResearchObservers } from "./agents";
import type { TemplateVariables } from "./prompts/template";
import { errorMessage } from "./utils/errors";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkg: { version?: string } = JSON.parse(readFileSync(resolve(__dirname, "../package.json"), "utf8"));

interface RunOptions {
  prompt?: string;
  promptVersion?: string;
  var: TemplateVariables;
  maxIterations?: number;
  rawNotes?: boolean;
  verbose?: boolean;
}

function collectVariable(entry: string, variables: TemplateVariables): TemplateVariables {
  const separator = entry.indexOf("=");
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${entry}'`);
  }
  return { ...variables, [entry.slice(0, separator)]: entry.slice(separator + 1) };
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function consoleObservers(verbose: boolean): ResearchObservers {
  return {
    onStateChange: (from, to) => {
      if (verbose) console.error(`[state] ${from} -> ${to}`);
    },
    onToolCall: (request) => console.error(`→ ${request.name} ${JSON.stringify(request.arguments)}`),
    onToolResult: (result) => {
      if (verbose) console.error(`← ${result.name}: ${result.content.slice(0, 300)}`);
    },
    onForcedCompression: (iterations) =>
      console.error(`⚠️ Iteration limit reached after ${iterations} tool batch(es); compressing what was found.`),
    onStatus: (message) => console.error(message)
  };
}

const program = new Command();

program
  .name("deep-research")
  .description("Iterative research agent backed by versioned prompt templates")
  .version(pkg.version ?? "0.0.0");

program
  .command("run")
  .description("Research a topic, compress the findings and run a quality check")
  .argument("[topic...]", "Research topic (omit when --prompt renders it)")
  .option("-p, --prompt <name>", "Render the topic from this stored prompt")
  .option("--prompt-version <version>", "Version of --prompt (default: latest)")
  .option("--var <key=value>", "Variable for --prompt (repeatable)", collectVariable, {})
  .option("-m, --max-iterations <n>", "Tool batches before compression is forced", parsePositiveInteger)
  .option("--raw-notes", "Also print the raw research notes")
  .option("--verbose", "Log state transitions and tool output")
  .action(async (topicParts: string[], options: RunOptions) => {
    const settings = loadSettings({
      runtime: { maxIterations: options.maxIterations, verbose: options.verbose }
    });
    const orchestrator = new Orchestrator(settings);

    let topic = topicParts.join(" ");
    if (options.prompt) {
      const store = await orchestrator.prompts();
      topic = store.render(store.resolve(options.prompt, options.promptVersion), options.var);
    }

    const result = await orchestrator.run(topic, consoleObservers(settings.runtime.verbose));

    console.log("=== Compressed Research ===\n");
    console.log(result.compressedResearch);
    console.log("\n=== QA Report ===\n");
    console.log(result.qaReport);
    if (options.rawNotes) {
      console.log("\n=== Raw Notes ===\n");
      console.log(result.rawNotes.join("\n\n"));
    }
    console.error(`\n${result.iterations} tool batch(es); prompts: ${Object.keys(result.prompts).join(", ")}`);
  });

const prompts = program.command("prompts").description("Inspect the versioned prompt store");

async function openStore() {
  return new Orchestrator(loadSettings()).prompts();
}

prompts
  .command("list")
  .description("List prompt names and their versions")
  .action(async () => {
    const store = await openStore();
    for (const name of store.listPrompts()) {
      console.log(`${name}: ${store.listVersions(name).join(", ")}`);
    }
  });

prompts
  .command("versions <name>")
  .description("List the versions of a prompt")
  .action(async (name: string) => {
    const store = await openStore();
    console.log(store.listVersions(name).join("\n"));
  });

prompts
  .command("changelog <name>")
  .description("Show date, author and changes per version")
  .action(async (name: string) => {
    const store = await openStore();
    for (const [version, entry] of Object.entries(store.changelog(name))) {
      console.log(`${version}  ${entry.date}  ${entry.author}  ${entry.changes}`);
    }
  });

prompts
  .command("diff <name> <version1> <version2>")
  .description("Compare two versions of a prompt")
  .action(async (name: string, version1: string, version2: string) => {
    const store = await openStore();
    const comparison = store.compare(name, version1, version2);
    console.log(`content changed: ${comparison.contentChanged} (${comparison.fingerprint1} → ${comparison.fingerprint2})`);
    console.log(`tags added: ${comparison.tagsAdded.join(", ") || "-"}`);
    console.log(`tags removed: ${comparison.tagsRemoved.join(", ") || "-"}`);
    console.log(`model hints changed: ${comparison.modelHintsChanged}`);
    if (comparison.contentChanged) {
      console.log(`\n${comparison.patch}`);
    }
  });

prompts
  .command("show <name> [version]")
  .description("Print a prompt's metadata and body")
  .action(async (name: string, version: string | undefined) => {
    const store = await openStore();
    const template = store.resolve(name, version);
    console.log(`${template.name} ${template.version} (${template.fingerprint}) by ${template.author}, ${template.date}`);
    console.log(`tags: ${template.tags.join(", ") || "-"}`);
    console.log(`\n${template.body}`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`✖ ${errorMessage(error)}`);
  process.exitCode = 1;
});
