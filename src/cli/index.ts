// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes configuration loading,
 * service layers, and error display to avoid duplication across commands.
 */

import { hostname as osHostname } from "node:os";
import { Command } from "@effect/cli";
import type { CliApp } from "@effect/cli/CliApp";
import { NodeContext } from "@effect/platform-node";
import { Effect, Layer, Match, Option, pipe } from "effect";
import { FileRunLogLive, type RunLog } from "../backup/run-log";
import { type EnvConfig, EnvConfigSpec } from "../config/env";
import type { LogFormat, LogLevel } from "../config/field-values";
import { loadConfig } from "../config/loader";
import { resolveLogFormat, resolveLogLevel } from "../config/resolve";
import type { BackupConfig } from "../config/schema";
import { AppLoggerLive, supportsColor } from "../lib/effect-logger";
import {
  type AppError,
  ConfigError,
  ErrorCode,
  type SystemError,
  getErrorCodeName,
  isAppError,
} from "../lib/errors";
import { formatSchemaError } from "../lib/schema-utils";
import { type AbsolutePath, type Hostname, decodeHostname } from "../lib/types";
import { PROGRAM_NAME, VERSION } from "../lib/version";
import { type Notifier, NotifierLive } from "../notify/telegram";
import { RcloneTransportLive } from "../remote/rclone";
import type { RemoteTransport } from "../remote/transport";

import { executeCheck } from "./commands/check";
import { executeList } from "./commands/list";
import { executeLogs } from "./commands/logs";
import { executeRestore, executeVerify } from "./commands/restore";
import { executeRun } from "./commands/run";

import {
  type GlobalOptions,
  dryRun,
  globalOptions,
  lines,
  selectionArg,
  sendTest,
  snapshotArg,
  target,
} from "./options";

/** Resolved runtime context for commands. Merges CLI args > env vars > config file (priority order). */
interface CommandContext {
  readonly config: BackupConfig;
  readonly source: Option.Option<AbsolutePath>;
  readonly hostname: Hostname;
  readonly format: LogFormat;
  readonly logLevel: LogLevel;
}

type CommandServices = RemoteTransport | Notifier | RunLog;

// Context resolution

const currentHostname: Effect.Effect<Hostname, ConfigError> = Effect.suspend(() =>
  pipe(
    decodeHostname(osHostname()),
    Effect.mapError((e) => formatSchemaError(e, "hostname"))
  )
);

const readEnvironment: Effect.Effect<EnvConfig, ConfigError> = pipe(
  EnvConfigSpec,
  Effect.mapError(
    (e) =>
      new ConfigError({
        code: ErrorCode.CONFIG_VALIDATION_ERROR,
        message: `Invalid environment: ${String(e)}`,
      })
  )
);

const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, ConfigError | SystemError> =>
  Effect.gen(function* () {
    const env = yield* readEnvironment;
    const { config, source } = yield* loadConfig(globals.config, env.home, env.overrides);

    return {
      config,
      source,
      hostname: yield* currentHostname,
      format: resolveLogFormat(globals, env, config.logging),
      logLevel: resolveLogLevel(globals, env, config.logging),
    };
  });

/** Format before the configuration is known: flags only. */
const flagFormat = (globals: GlobalOptions): LogFormat =>
  globals.json ? "json" : Option.getOrElse(globals.format, (): LogFormat => "pretty");

// Error display

/** Sync because it also runs on the exit path. */
const displayError = (err: unknown, format: LogFormat): void => {
  if (!isAppError(err)) {
    return;
  }
  pipe(
    Match.value(format),
    Match.when("json", () =>
      process.stdout.write(
        `${JSON.stringify({ error: err.message, code: err.code, name: getErrorCodeName(err.code) })}\n`
      )
    ),
    Match.when("pretty", () => {
      const prefix = supportsColor(process.env, process.stderr.isTTY === true)
        ? "\x1b[31m✗\x1b[0m"
        : "✗";
      process.stderr.write(`${prefix} ${err.message}\n`);
    }),
    Match.exhaustive
  );
};

// Command runner

const commandLayer = (ctx: CommandContext): Layer.Layer<CommandServices> =>
  Layer.mergeAll(
    AppLoggerLive({ level: ctx.logLevel, format: ctx.format }),
    RcloneTransportLive,
    NotifierLive(ctx.config),
    FileRunLogLive(ctx.config.backup.logFile)
  );

/** Centralizes config, layers, and error display so each command stays focused on its logic. */
const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, AppError, CommandServices>
): Effect.Effect<void, AppError> =>
  Effect.gen(function* () {
    const ctx = yield* pipe(
      resolveContext(globals),
      Effect.tapError((err) => Effect.sync(() => displayError(err, flagFormat(globals))))
    );
    yield* pipe(
      Effect.logDebug(
        `Configuration: ${Option.getOrElse(ctx.source, (): string => "environment only")}`
      ),
      Effect.zipRight(handler(ctx)),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
      Effect.provide(commandLayer(ctx))
    );
  });

// Subcommand definitions

const runCmd = Command.make("run", { ...globalOptions, dryRun }, (args) =>
  runCommand(args, "run", (ctx) =>
    executeRun({
      config: ctx.config,
      hostname: ctx.hostname,
      format: ctx.format,
      dryRun: args.dryRun,
    })
  )
).pipe(Command.withDescription("Archive, encrypt, upload and prune"));

const listCmd = Command.make("list", { ...globalOptions }, (args) =>
  runCommand(args, "list", (ctx) => executeList({ config: ctx.config, format: ctx.format }))
).pipe(Command.withDescription("List backups in the remote directory"));

const restoreCmd = Command.make(
  "restore",
  { ...globalOptions, name: snapshotArg, target },
  (args) =>
    runCommand(args, "restore", (ctx) =>
      executeRestore({
        config: ctx.config,
        hostname: ctx.hostname,
        format: ctx.format,
        name: args.name,
        target: args.target,
      })
    )
).pipe(Command.withDescription("Download, decrypt and extract a backup"));

const verifyCmd = Command.make("verify", { ...globalOptions, selection: selectionArg }, (args) =>
  runCommand(args, "verify", (ctx) =>
    executeVerify({
      config: ctx.config,
      hostname: ctx.hostname,
      format: ctx.format,
      selection: args.selection,
    })
  )
).pipe(Command.withDescription("Check that a backup decrypts and lists, keeping nothing"));

const logsCmd = Command.make("logs", { ...globalOptions, lines }, (args) =>
  runCommand(args, "logs", (ctx) =>
    executeLogs({ config: ctx.config, format: ctx.format, lines: args.lines })
  )
).pipe(Command.withDescription("Show the end of the run log"));

const checkCmd = Command.make("check", { ...globalOptions, sendTest }, (args) =>
  runCommand(args, "check", (ctx) =>
    executeCheck({
      config: ctx.config,
      hostname: ctx.hostname,
      format: ctx.format,
      sendTest: args.sendTest,
    })
  )
).pipe(Command.withDescription("Self-test: sources, tools, remote, encryption, notifications"));

// Root command

const root = Command.make(PROGRAM_NAME).pipe(
  Command.withDescription("Encrypted, verified backups of this host to remote storage"),
  Command.withSubcommands([runCmd, listCmd, restoreCmd, verifyCmd, logsCmd, checkCmd])
);

export const cli: (args: readonly string[]) => Effect.Effect<void, unknown, CliApp.Environment> =
  Command.run(root, {
    name: PROGRAM_NAME,
    version: VERSION,
  });

/** `argv` as in `process.argv`, interpreter and script first. */
export const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  pipe(cli(argv), Effect.provide(NodeContext.layer));
