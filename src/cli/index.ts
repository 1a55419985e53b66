#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runCanonize } from "../commands/run";
import { runValidate } from "../commands/validate";
import { runDiscover } from "../commands/discover";
import { runTransformFile } from "../commands/transformFile";
import { createLogger, isLogLevel, LOG_LEVELS, LogLevel } from "../utils/logger";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.VAULT_CANONIZE_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(", ")}.`);
  }
  return value;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const envLogLevel = process.env.VAULT_CANONIZE_LOG_LEVEL;
const defaultLogLevel: LogLevel = envLogLevel && isLogLevel(envLogLevel) ? envLogLevel : "info";

const program = new Command();

program
  .name("vault-canonize")
  .description("Transform vault manifests into per-account canonical JSONL")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides VAULT_CANONIZE_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);
program.option("--log-level <level>", "error | warn | info | debug", parseLogLevel, defaultLogLevel);

function stageLogger() {
  const { logLevel } = program.opts<{ logLevel: LogLevel }>();
  return createLogger({ level: logLevel });
}

program
  .command("run")
  .description("Run the canonize stage over every configured mapping")
  .requiredOption("--config <path>", "Path to stage config JSON")
  .option("--report <path>", "Write the stage result as JSON")
  .action(async (opts: { config: string; report?: string }) => {
    await runCanonize({ configPath: opts.config, reportPath: opts.report, logger: stageLogger() });
  });

program
  .command("validate")
  .description("Check stage preconditions without transforming anything")
  .requiredOption("--config <path>", "Path to stage config JSON")
  .action(async (opts: { config: string }) => {
    await runValidate({ configPath: opts.config });
  });

program
  .command("discover")
  .description("List the LATEST manifest of every account per mapping")
  .requiredOption("--config <path>", "Path to stage config JSON")
  .action(async (opts: { config: string }) => {
    await runDiscover({ configPath: opts.config, logger: stageLogger() });
  });

program
  .command("transform-file")
  .description("Transform a single JSONL file outside the vault")
  .requiredOption("--config <path>", "Path to stage config JSON")
  .requiredOption("--input <path>", "JSONL file to transform")
  .option("--mapping <pattern>", "Source pattern of a configured mapping")
  .option("--transform <name>", "Transform name (overrides the mapping's)")
  .option("--output-name <name>", "Output file base name")
  .action(
    async (opts: { config: string; input: string; mapping?: string; transform?: string; outputName?: string }) => {
      await runTransformFile({
        configPath: opts.config,
        inputFile: opts.input,
        mapping: opts.mapping,
        transform: opts.transform,
        outputName: opts.outputName,
        logger: stageLogger()
      });
    }
  );

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
