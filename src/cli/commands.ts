import fs from "node:fs";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { Command } from "commander";
import prompts from "prompts";
import chalk from "chalk";
import { getConfigPath, loadConfig, saveConfig } from "../config/loader.js";
import { DEFAULT_CONFIG, type Config } from "../config/schema.js";
import { MessageBus } from "../bus/queue.js";
import { ChannelManager } from "../channels/manager.js";
import { CommandRouter, formatStatus } from "../commands/router.js";
import { TriggerExecutor } from "../cron/executor.js";
import { FIELD_SEPARATOR, loadTriggers, parseTriggerSpec } from "../cron/parser.js";
import { TriggerScheduler, snapshotTrigger } from "../cron/service.js";
import type { TriggerCategory } from "../cron/types.js";
import { ConfigError, errorMessage } from "../errors.js";
import { Notifier } from "../notify/notifier.js";
import { makeProviderRegistry, type ProviderRegistry } from "../providers/registry.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("cronrelay");

function readConfig(): Config | null {
  try {
    return loadConfig();
  } catch (err) {
    console.log(chalk.red(err instanceof ConfigError ? err.message : `Failed to load config: ${errorMessage(err)}`));
    process.exitCode = 1;
    return null;
  }
}

export interface Runtime {
  bus: MessageBus;
  channels: ChannelManager;
  scheduler: TriggerScheduler;
  notifier: Notifier;
  providers: ProviderRegistry;
}

export function createRuntime(config: Config): Runtime {
  const bus = new MessageBus();
  const channels = ChannelManager.fromConfig(config.channels, bus);
  const notifier = Notifier.fromConfig(config, channels);
  const providers = makeProviderRegistry(config);
  const executor = new TriggerExecutor({
    providers,
    sender: channels,
    notifier,
    systemPrompt: config.systemPrompt,
    timeoutMs: config.executionTimeout * 1000,
  });
  const { triggers } = loadTriggers(config);
  const scheduler = new TriggerScheduler({ triggers, executor, intervalMs: config.schedulerCheckInterval * 1000 });
  return { bus, channels, scheduler, notifier, providers };
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("cronrelay")
    .description("cronrelay - scheduled LLM prompts delivered to chat rooms and users")
    .version("0.1.0", "-v, --version", "show version");

  program.command("init").description("Create a default config file").action(async () => {
    const configPath = getConfigPath();
    if (fs.existsSync(configPath)) {
      const rl = readline.createInterface({ input, output });
      const ans = (await rl.question(`Config already exists at ${configPath}. Overwrite? [y/N] `)).trim().toLowerCase();
      rl.close();
      if (ans !== "y") {
        console.log("Kept existing config.");
        return;
      }
    }
    saveConfig(structuredClone(DEFAULT_CONFIG), configPath);
    console.log(chalk.green(`Created config at ${configPath}`));
    console.log(chalk.gray("Add providers and channels, then run `cronrelay add` to schedule a prompt."));
  });

  program.command("run").description("Start the scheduler and chat command listener").action(async () => {
    const config = readConfig();
    if (!config) return;
    const { bus, channels, scheduler, notifier, providers } = createRuntime(config);
    const router = new CommandRouter({ bus, scheduler, adminUserId: config.adminUserId });

    if (channels.enabledChannels.length) log.info(`Channels enabled: ${channels.enabledChannels.join(", ")}`);
    else log.warn("No channels enabled; every delivery will fail until one is configured.");
    log.info(`Providers: ${providers.names().join(", ") || "none"}`);
    log.info(`Notifications: ${notifier.route.description}`);

    await scheduler.start();
    channels.startAll();
    router.start();

    await new Promise<void>((resolve) => {
      const shutdown = (signal: string) => {
        log.info(`${signal} received, shutting down`);
        resolve();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    await scheduler.stop();
    await channels.stopAll();
    bus.close();
    await router.wait();
  });

  program.command("status").description("List triggers with their next run").action(() => {
    const config = readConfig();
    if (!config) return;
    const { triggers, rejected } = loadTriggers(config, { logger: createLogger("status") });
    console.log(formatStatus(triggers.map(snapshotTrigger), config.schedulerCheckInterval * 1000));
    if (rejected.length) {
      console.log(chalk.yellow(`\nRejected entries: ${rejected.length}`));
      for (const r of rejected) console.log(chalk.yellow(`- [${r.category}] ${r.raw}: ${r.error.message}`));
    }
  });

  program.command("test").description("Run every trigger once and report how many delivered").action(async () => {
    const config = readConfig();
    if (!config) return;
    const { channels, scheduler } = createRuntime(config);
    console.log("Testing all triggers...");
    const { success, total } = await scheduler.runAll();
    await channels.stopAll();
    console.log(chalk[success === total ? "green" : "yellow"](`Trigger test complete\nSucceeded: ${success}/${total}`));
    if (success < total) process.exitCode = 1;
  });

  program.command("add").description("Interactively add a scheduled trigger").action(async () => {
    const config = readConfig();
    if (!config) return;

    const answers = await prompts([
      {
        type: "select",
        name: "category",
        message: "Deliver to",
        choices: [
          { title: "A group / room", value: "room" },
          { title: "A single user", value: "direct" },
        ],
      },
      {
        type: "select",
        name: "channel",
        message: "Channel",
        choices: ["telegram", "discord", "console"].map((c) => ({ title: c, value: c })),
      },
      { type: "text", name: "target", message: "Room or user id", validate: (v: string) => (v.trim() ? true : "Target cannot be empty") },
      {
        type: Object.keys(config.providers).length ? "select" : "text",
        name: "provider",
        message: "Provider name",
        choices: Object.keys(config.providers).map((p) => ({ title: p, value: p })),
      },
      { type: "text", name: "cron", message: "Cron expression (min hour dom mon dow)", initial: "0 9 * * *" },
      { type: "text", name: "prompt", message: "Prompt", validate: (v: string) => (v.trim() ? true : "Prompt cannot be empty") },
    ]);

    const category: TriggerCategory = answers.category === "direct" ? "direct" : "room";
    const raw = [answers.channel, answers.target, answers.provider, answers.cron, answers.prompt].map((v) => String(v ?? "").trim()).join(FIELD_SEPARATOR);
    try {
      const state = parseTriggerSpec(raw, category, Date.now());
      if (category === "room") config.platformGroupProviderMap.push(raw);
      else config.platformFriendProviderMap.push(raw);
      saveConfig(config);
      console.log(chalk.green(`Added ${category} trigger, first run at ${new Date(state.nextRunAtMs).toISOString()}`));
    } catch (err) {
      console.log(chalk.red(`Not added: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });

  program.command("doctor").description("Check every configured provider with a short prompt").action(async () => {
    const config = readConfig();
    if (!config) return;
    const registry = makeProviderRegistry(config);
    const configured = Object.keys(config.providers);
    if (!configured.length) {
      console.log(chalk.yellow("No providers configured."));
      return;
    }
    for (const name of configured) {
      const provider = registry.get(name);
      if (!provider) {
        console.log(chalk.red(`${name}: not usable (see error above)`));
        process.exitCode = 1;
        continue;
      }
      const result = await provider.textChat({ prompt: "Reply with: OK", contexts: [], systemPrompt: config.systemPrompt });
      if (result.finishReason === "error") {
        console.log(chalk.red(`${name}: ${result.completionText ?? "error"}`));
        process.exitCode = 1;
      } else {
        console.log(chalk.green(`${name} (${provider.getDefaultModel()}): ${result.completionText ?? "(empty response)"}`));
      }
    }
  });

  return program;
}
