#!/usr/bin/env -S node --import tsx
import { Command, Option } from "commander";
import { BACKEND_PROVIDERS } from "../runtime/backends/types";
import { APP_VERSION } from "../version";
import type { StartCommandOptions } from "./commands/start";

const program = new Command()
  .name("swarmcast")
  .description("Leaderless LLM agent swarm over UDP multicast")
  .version(APP_VERSION);

program
  .command("start")
  .description("Join the swarm as one agent")
  .option("-c, --config <path>", "Config file path")
  .option("-i, --agent-id <id>", "Agent name shown to peers")
  .option("-a, --multicast-address <host:port>", "Multicast group and port")
  .option("--interface <name-or-ip>", "Network interface for multicast traffic")
  .addOption(
    new Option("-b, --llm-backend <provider>", "LLM backend").choices([...BACKEND_PROVIDERS]),
  )
  .option("-m, --model <name>", "Model name")
  .option("-k, --api-key <key>", "API key for the backend")
  .option("--endpoint <url>", "Custom backend base URL")
  .option("--timeout <seconds>", "Per-request timeout in seconds")
  .option("--max-retries <n>", "Retries for transient backend failures")
  .option("--log-level <level>", "fatal, error, warn, info, debug or trace")
  .addOption(
    new Option("--personality <text>", "Inline personality").conflicts("personalityFile"),
  )
  .addOption(
    new Option("--personality-file <path>", "Read the personality from a file").conflicts(
      "personality",
    ),
  )
  .option("--processing-delay <ms>", "Pause before each generation, in milliseconds")
  .option("--voice", "Speak replies through the configured player")
  .addOption(new Option("--mode <mode>", "Turn-taking mode").choices(["free", "debate"]))
  .option("--role <role>", "Debate role of this agent")
  .option("--debate-roles <list>", "Comma-separated debate speaking order")
  .option("--rounds <n>", "Number of debate rounds")
  .action(async (_options: unknown, command: Command) => {
    const { startAgent } = await import("./commands/start");
    await startAgent(command.opts<StartCommandOptions>());
  });

const configCmd = program.command("config").description("Inspect the configuration");

configCmd
  .command("validate")
  .description("Validate the config file")
  .option("-c, --config <path>", "Config file path")
  .action(async (_options: unknown, command: Command) => {
    const { validateConfig } = await import("./commands/config");
    validateConfig(command.opts<{ config?: string }>().config);
  });

await program.parseAsync();

export { program };
