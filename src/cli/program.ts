import { existsSync, statSync } from "node:fs";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import pc from "picocolors";
import pkg from "../../package.json";
import { getConfig, loadConfig, setConfig } from "../config";
import { SecretsFileError } from "../secrets/errors";
import type { ScanResponse } from "../secrets/modules/types";
import { type CheckOutcome, logFailedScan, runCarve, runCheck } from "../services/scanner";
import { FetchError, type FetchLike, fetchForCarving } from "./fetch";
import { type Colors, formatHashcat, formatResult, NO_SECRETS_FOUND } from "./report";

const URL_PATTERN =
  /^https?:\/\/((?:[A-Z0-9_]|[A-Z0-9_][A-Z0-9\-_]*[A-Z0-9_])[.]?)+(?:[A-Z0-9_][A-Z0-9\-_]*[A-Z0-9_]|[A-Z0-9_])(?::[0-9]{1,5})?.*$/i;

export interface CliOptions {
  url?: string;
  customSecrets?: string;
  hashcat: boolean;
  config?: string;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  fetchImpl?: FetchLike;
  colors?: Colors;
}

const defaultIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function validateUrl(value: string): string {
  if (!URL_PATTERN.test(value)) {
    throw new InvalidArgumentError("URL is not formatted correctly");
  }
  return value;
}

/**
 * Path checks only; content is validated when the secrets are loaded
 */
export function validateFile(value: string): string {
  if (!existsSync(value)) {
    throw new InvalidArgumentError(`The file ${value} does not exist!`);
  }
  if (!statSync(value).isFile()) {
    throw new InvalidArgumentError(`${value} is not a valid file!`);
  }
  return value;
}

async function carveUrl(
  url: string,
  options: CliOptions,
  io: CliIO,
  colors: Colors,
): Promise<number> {
  const startTime = Date.now();
  const config = getConfig();

  let response: ScanResponse;
  try {
    response = await fetchForCarving(url, {
      timeoutMs: config.scan.fetch_timeout_ms,
      fetchImpl: io.fetchImpl,
    });
  } catch (error) {
    if (error instanceof FetchError) {
      io.out(error.message);
      logFailedScan("cli", "carve", startTime, error, url);
      return 1;
    }
    throw error;
  }

  const results = runCarve(response, "cli", url, { hashcat: options.hashcat });
  if (results.length === 0) {
    io.out(NO_SECRETS_FOUND);
    return 0;
  }

  for (const result of results) {
    for (const line of formatResult(result, colors)) io.out(line);
  }
  return 0;
}

function checkValues(values: string[], options: CliOptions, io: CliIO, colors: Colors): number {
  const startTime = Date.now();

  let outcome: CheckOutcome;
  try {
    outcome = runCheck(values, "cli", {
      custom: options.customSecrets ? { path: options.customSecrets } : undefined,
      hashcat: options.hashcat,
    });
  } catch (error) {
    if (error instanceof SecretsFileError) {
      io.err(error.message);
      logFailedScan("cli", "check", startTime, error);
      return 1;
    }
    throw error;
  }

  if (outcome.result) {
    for (const line of formatResult(outcome.result, colors)) io.out(line);
    return 0;
  }

  io.out(NO_SECRETS_FOUND);
  if (outcome.hashcat.length > 0) {
    for (const line of formatHashcat(outcome.hashcat, colors)) io.out(line);
  }
  return 0;
}

/**
 * Parses arguments and runs one scan; resolves to the process exit code
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const colors = io.colors ?? pc;
  let exitCode = 0;

  const program = new Command()
    .name("keysleuth")
    .description("Check cryptographic tokens against known and default secrets")
    .version(pkg.version)
    .argument("[values...]", "token value(s) to check; supply every value for multi-value modules")
    .option(
      "-u, --url <url>",
      "URL mode: fetch the page and check its cookies, headers and body",
      validateUrl,
    )
    .option(
      "-c, --custom-secrets <file>",
      "load a custom secrets file along with the default secrets",
      validateFile,
    )
    .option("--no-hashcat", "skip hashcat suggestions when no secret is found")
    .option("--config <path>", "configuration file")
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.out(s.trimEnd()),
      writeErr: (s) => io.err(s.trimEnd()),
    })
    .action(async (values: string[], options: CliOptions, command: Command) => {
      if (options.config) {
        setConfig(loadConfig(options.config));
      }

      if (!options.url && values.length === 0) {
        command.error(
          "Either supply the token as a positional argument (all values for multi-value modules), or use --url mode with a valid URL",
        );
      }
      if (options.url && values.length > 0) {
        command.error("In --url mode, no positional arguments should be used");
      }

      io.out(colors.bold("keysleuth - command line interface"));
      io.out("");

      exitCode = options.url
        ? await carveUrl(options.url, options, io, colors)
        : checkValues(values, options, io, colors);
    });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
