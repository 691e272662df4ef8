#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command, InvalidArgumentError } from "commander";
import inquirer from "inquirer";
import chalk from "chalk";
import { PROVIDER_NAMES, ProviderName, getCatalogEntry, isProviderName } from "./ai/catalog";
import { getProvider } from "./ai/factory";
import { isValidOpenRouterModel } from "./ai/openRouterProvider";
import { ProviderRegistry } from "./ai/registry";
import { getConfigPath, loadConfig, saveConfig } from "./config/loader";
import { AiConfig, CommitwrightConfig } from "./config/types";
import { APP_NAME } from "./constants";
import { ConfigurationError } from "./errors";
import { formatCommitMessage } from "./formatter/commitFormatter";
import { commitMessage, getStagedChanges, hasStagedChanges, isGitRepo } from "./git/gitClient";
import { logger, setVerbose } from "./logger";

interface GenerateOptions {
  provider?: ProviderName;
  model?: string;
  commit: boolean;
  yes: boolean;
}

interface ConfigOptions {
  provider?: ProviderName;
  model?: string;
  apiKey?: string;
}

function parseProviderName(value: string): ProviderName {
  const name = value.trim().toLowerCase();
  if (!isProviderName(name)) {
    throw new InvalidArgumentError(`Choose from ${PROVIDER_NAMES.join("|")}.`);
  }
  return name;
}

function readPackageVersion(): string {
  try {
    const pkgPath = path.resolve(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (error) {
    logger.debug(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
  }
  return "0.0.0";
}

async function confirmCommit(): Promise<boolean> {
  const { ok } = await inquirer.prompt<{ ok: boolean }>([
    { type: "confirm", name: "ok", message: "Commit with this message?", default: true },
  ]);
  return ok;
}

async function commandGenerate(cwd: string, config: CommitwrightConfig, options: GenerateOptions) {
  if (!isGitRepo(cwd)) {
    throw new Error("Not a git repository.");
  }

  if (!hasStagedChanges(cwd)) {
    throw new Error("No staged changes. Stage files with 'git add' first.");
  }

  const diff = getStagedChanges(cwd);
  logger.debug(`Staged ${diff.files.length} file(s), +${diff.totalAdditions} -${diff.totalDeletions}`);

  const provider = getProvider(config, { provider: options.provider, model: options.model });
  const problems = provider.validateConfig();
  if (problems.length) {
    throw new ConfigurationError(problems.join("\n"));
  }

  const message = await provider.generateCommitMessage(diff);
  const text = formatCommitMessage(message, { maxSubjectLength: config.commit.maxSubjectLength });

  console.log("\n" + chalk.blue.bold(`Suggestion (${provider.name}):`));
  console.log(chalk.green(text));

  if (!options.commit) return;
  if (!options.yes && !(await confirmCommit())) {
    logger.info("Aborted.");
    return;
  }
  commitMessage(cwd, text);
  logger.success("Commit created.");
}

function commandProviders(registry: ProviderRegistry) {
  console.log(chalk.blue.bold("Available providers:"));
  for (const info of registry.listProviders()) {
    const status = info.configured ? chalk.green("✓ configured") : chalk.gray("✗ not configured");
    console.log(`\n${chalk.bold(info.name)}  ${status}`);
    console.log(`  ${info.description}`);
    console.log(`  ${chalk.gray("Models:")} ${info.models.join(", ")}`);
  }
}

function commandConfig(cwd: string, options: ConfigOptions) {
  // Environment overrides stay out of the saved file.
  const current = loadConfig(cwd, {});
  const provider = options.provider ?? current.ai.provider;
  const previous: Partial<AiConfig> = provider === current.ai.provider ? current.ai : {};

  const model = options.model ?? previous.model;
  if (provider === "openrouter" && model && !isValidOpenRouterModel(model)) {
    throw new ConfigurationError(`Invalid model format '${model}'. Must be 'vendor/model-name' (e.g., 'openai/gpt-4o')`);
  }

  let apiKey = options.apiKey ?? previous.apiKey;
  if (!apiKey) {
    const detected = getCatalogEntry(provider).envVars.find((name) => process.env[name]?.trim());
    if (detected) {
      apiKey = `env:${detected}`;
      console.log(chalk.gray(`Detected ${detected} in environment; wiring it in config.`));
    }
  }

  if (!apiKey && provider !== "ollama") {
    logger.warn(`no API key provided; ${provider} will fail validation until one is set.`);
  }

  const nextAi: AiConfig = { ...previous, provider, model, apiKey };
  saveConfig(cwd, { ai: nextAi });
  logger.success(`Saved provider=${provider}${model ? `, model=${model}` : ""} to ${path.basename(getConfigPath(cwd))}.`);
}

async function run(action: () => Promise<void> | void): Promise<void> {
  try {
    await action();
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

async function main() {
  const program = new Command();
  program
    .name(APP_NAME)
    .description("Generate conventional commit messages for staged changes with AI providers")
    .version(readPackageVersion(), "-V, --version")
    .option("--verbose", "Print debug output", false)
    .hook("preAction", () => {
      if (program.opts<{ verbose: boolean }>().verbose) {
        setVerbose(true);
      }
    });

  program
    .command("generate", { isDefault: true })
    .description("Generate a commit message for the staged changes")
    .option("-p, --provider <name>", `AI provider (${PROVIDER_NAMES.join("|")})`, parseProviderName)
    .option("-m, --model <model>", "Model identifier")
    .option("-c, --commit", "Commit with the generated message", false)
    .option("-y, --yes", "Skip the confirmation prompt", false)
    .action((opts: GenerateOptions) =>
      run(async () => {
        const cwd = process.cwd();
        const config = loadConfig(cwd);
        if (config.verbose) setVerbose(true);
        await commandGenerate(cwd, config, opts);
      })
    );

  program
    .command("providers")
    .description("List AI providers and whether they are configured")
    .action(() => run(() => commandProviders(new ProviderRegistry())));

  program
    .command("config")
    .description(`Save provider settings to the project's config file`)
    .option("--provider <name>", `AI provider (${PROVIDER_NAMES.join("|")})`, parseProviderName)
    .option("--model <model>", "Model identifier")
    .option("--api-key <key>", "API key (token or env:NAME reference)")
    .action((opts: ConfigOptions) => run(() => commandConfig(process.cwd(), opts)));

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
