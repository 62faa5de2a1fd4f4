// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Backup pipeline orchestrator.
 *
 *   INIT → LOCKED → SPACE_OK → ARCHIVED → ENCRYPTED → HASHED → UPLOADED → PRUNED → DONE
 *
 * FAILED is reachable from every non-terminal state. The lock and the
 * scratch directory are scoped resources, so they are released on success,
 * failure and interruption alike; the plaintext archive is deleted as soon
 * as encryption finishes, whatever the outcome.
 */

import { Cause, Clock, Duration, Effect, Exit, Option, Ref, type Scope, pipe } from "effect";
import type { BackupConfig } from "../config/schema";
import { BackupError, ErrorCode, type SystemError, causeOf } from "../lib/errors";
import { formatBytes, formatDuration } from "../lib/format";
import { createStepCounter, logFail, logSuccess, withStage } from "../lib/log";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { Notifier, failureMessage, notifySafely, startMessage, successMessage } from "../notify/telegram";
import type { RemoteTransport } from "../remote/transport";
import { encryptFile } from "../system/age";
import { createArchive, planArchive } from "../system/archive";
import { MIN_FREE_BYTES, ensureFreeSpace } from "../system/disk";
import {
  deleteDirectory,
  deleteFileIfExists,
  ensureDirectory,
  getFileSize,
  sha256File,
  writeFile,
} from "../system/fs";
import { lockScoped } from "../system/lock";
import { type ArtifactNames, artifactNames, formatTimestamp } from "./naming";
import { pruneRemote } from "./retention";
import { COMPLETION_PHRASE, RunLog } from "./run-log";
import {
  type PipelineState,
  PipelineWarning,
  type StateTracker,
  describeWarning,
  makeStateTracker,
} from "./state";
import { uploadChecksum, uploadVerified } from "./upload";

export interface PipelineOptions {
  readonly hostname: string;
  /** Run start; names the artifact and anchors the retention age floor */
  readonly now: Date;
  /** Free space required in `tmpDir` (default 1 GiB) */
  readonly minFreeBytes?: number;
}

export interface RunReport {
  readonly artifact: string;
  readonly size: number;
  readonly kept: readonly string[];
  readonly pruned: readonly string[];
  readonly warnings: readonly PipelineWarning[];
  readonly states: readonly PipelineState[];
}

export type PipelineError = BackupError | SystemError;

export type PipelineRequirements = RemoteTransport | Notifier | RunLog;

const PIPELINE_STAGES = 7;

/** `tmpDir/run-<timestamp>-<pid>`, unique per run. */
export const scratchDirFor = (tmpDir: AbsolutePath, timestamp: string): AbsolutePath =>
  pathJoin(tmpDir, `run-${timestamp}-${process.pid}`);

const scratchDirScoped = (dir: AbsolutePath): Effect.Effect<AbsolutePath, SystemError, Scope.Scope> =>
  Effect.acquireRelease(Effect.as(ensureDirectory(dir), dir), () =>
    pipe(
      deleteDirectory(dir),
      Effect.catchAll((e) => Effect.logWarning(`Failed to remove scratch directory: ${e.message}`))
    )
  );

/** Any failure inside a stage surfaces as that stage's BackupError. */
const asStageError =
  (code: BackupError["code"], label: string) =>
  <A, R>(effect: Effect.Effect<A, BackupError | SystemError, R>): Effect.Effect<A, BackupError, R> =>
    Effect.mapError(effect, (e) =>
      e._tag === "BackupError"
        ? e
        : new BackupError({ code, message: `${label}: ${e.message}`, ...causeOf(e) })
    );

interface RunContext {
  readonly config: BackupConfig;
  readonly options: PipelineOptions;
  readonly names: ArtifactNames;
  readonly tracker: StateTracker;
  readonly warnings: Ref.Ref<readonly PipelineWarning[]>;
}

const warn = (ctx: RunContext, warning: PipelineWarning): Effect.Effect<void, never, RunLog> =>
  Effect.gen(function* () {
    const runLog = yield* RunLog;
    yield* Ref.update(ctx.warnings, (ws) => [...ws, warning]);
    yield* Effect.logWarning(describeWarning(warning));
    yield* runLog.append(`WARNING: ${describeWarning(warning)}`);
  });

/** The stages between acquiring the lock and pruning; runs inside the run's scope. */
const runStages = (
  ctx: RunContext
): Effect.Effect<
  { readonly size: number; readonly kept: readonly string[]; readonly pruned: readonly string[] },
  PipelineError,
  PipelineRequirements | Scope.Scope
> =>
  Effect.gen(function* () {
    const { config, options, names, tracker } = ctx;
    const runLog = yield* RunLog;
    const steps = yield* createStepCounter(PIPELINE_STAGES);

    // LOCKED
    yield* steps.next("Acquiring lock");
    yield* lockScoped(config.backup.lockFile);
    yield* tracker.transition("LOCKED");

    // SPACE_OK
    yield* steps.next("Checking free space");
    const available = yield* ensureFreeSpace(
      config.backup.tmpDir,
      options.minFreeBytes ?? MIN_FREE_BYTES
    );
    yield* Effect.logDebug(`${formatBytes(available)} available in ${config.backup.tmpDir}`);
    yield* tracker.transition("SPACE_OK");
    yield* runLog.append(`starting backup ${names.encrypted}`);

    const scratch = yield* scratchDirScoped(
      scratchDirFor(config.backup.tmpDir, formatTimestamp(options.now))
    );
    const archivePath = pathJoin(scratch, names.archive);
    const encryptedPath = pathJoin(scratch, names.encrypted);
    const checksumPath = pathJoin(scratch, names.checksum);

    // ARCHIVED
    yield* steps.next("Archiving sources");
    const plan = yield* planArchive(config.backup.sources);
    yield* Effect.forEach(plan.missing, (path) =>
      warn(ctx, PipelineWarning.SourceMissing({ path }))
    );
    yield* runLog.append(`archiving ${plan.included.length} source(s)`);
    yield* pipe(
      createArchive(archivePath, plan.included),
      withStage("archive")
    );
    yield* tracker.transition("ARCHIVED");

    // ENCRYPTED
    yield* steps.next("Encrypting archive");
    yield* runLog.append("encrypting archive");
    yield* pipe(
      encryptFile(archivePath, encryptedPath, {
        passphrase: config.backup.passphrase,
        workFactor: config.encryption.scryptWorkFactor,
      }),
      asStageError(ErrorCode.ENCRYPTION_FAILED, "Encryption failed"),
      Effect.ensuring(Effect.ignoreLogged(deleteFileIfExists(archivePath))),
      withStage("encrypt")
    );
    yield* tracker.transition("ENCRYPTED");

    // HASHED
    yield* steps.next("Computing checksum");
    const size = yield* pipe(
      Effect.gen(function* () {
        const digest = yield* sha256File(encryptedPath);
        yield* writeFile(checksumPath, `${digest}\n`);
        yield* Effect.logDebug(`sha256 ${digest}`);
        return yield* getFileSize(encryptedPath);
      }),
      asStageError(ErrorCode.CHECKSUM_FAILED, "Checksum failed"),
      withStage("hash")
    );
    yield* tracker.transition("HASHED");

    // UPLOADED
    yield* steps.next(`Uploading to ${config.backup.remote}`);
    yield* runLog.append(`uploading to ${config.backup.remote}`);
    const uploaded = yield* pipe(
      uploadVerified(encryptedPath, config.backup.remote, {
        attempts: config.upload.attempts,
        retryDelay: Duration.seconds(config.upload.retryDelaySeconds),
      }),
      asStageError(ErrorCode.UPLOAD_FAILED, "Upload failed"),
      withStage("upload")
    );
    yield* runLog.append(`upload verified after ${uploaded.attempts} attempt(s)`);
    const checksumFailure = yield* uploadChecksum(checksumPath, config.backup.remote);
    yield* Option.match(checksumFailure, {
      onNone: () => Effect.void,
      onSome: (message) => warn(ctx, PipelineWarning.ChecksumUploadWarning({ message })),
    });
    yield* Effect.ignoreLogged(deleteFileIfExists(encryptedPath));
    yield* Effect.ignoreLogged(deleteFileIfExists(checksumPath));
    yield* tracker.transition("UPLOADED");

    // PRUNED
    yield* steps.next("Applying retention");
    const retention = yield* pipe(
      pruneRemote(config.backup.remote, options.hostname, {
        maxKeep: config.backup.maxKeep,
        minAgeHours: config.backup.minAgeHours,
        now: options.now,
      }),
      withStage("retention")
    );
    yield* Effect.forEach(retention.warnings, (w) => warn(ctx, w));
    yield* Effect.forEach(retention.pruned, (name) => runLog.append(`pruned ${name}`));
    yield* tracker.transition("PRUNED");

    return { size, kept: retention.kept, pruned: retention.pruned };
  });

/**
 * Execute one backup run, recording every state in `tracker`. Fatal errors
 * are logged, notified and returned in the error channel; non-fatal ones are
 * collected in the report. An interrupted run still ends in FAILED.
 */
export const runPipelineTracked = (
  config: BackupConfig,
  options: PipelineOptions,
  tracker: StateTracker
): Effect.Effect<RunReport, PipelineError, PipelineRequirements> =>
  Effect.gen(function* () {
    const runLog = yield* RunLog;
    const notifier = yield* Notifier;
    const startedAt = yield* Clock.currentTimeMillis;
    const names = artifactNames(options.hostname, formatTimestamp(options.now));
    const warnings = yield* Ref.make<readonly PipelineWarning[]>([]);
    const ctx: RunContext = { config, options, names, tracker, warnings };

    const notify = (text: string): Effect.Effect<void, never, RunLog> =>
      Effect.flatMap(notifySafely(notifier, text), (failure) =>
        Option.match(failure, {
          onNone: () => Effect.void,
          onSome: (message) => warn(ctx, PipelineWarning.NotifyWarning({ message })),
        })
      );

    if (notifier.notifyStart) {
      yield* notify(startMessage(options.hostname));
    }

    const exit = yield* pipe(
      Effect.scoped(runStages(ctx)),
      Effect.onInterrupt(() =>
        Effect.gen(function* () {
          const reached = yield* tracker.current;
          yield* tracker.transition("FAILED");
          yield* logFail(`Backup interrupted after reaching ${reached}`);
          yield* runLog.append("ERROR: interrupted");
          yield* notify(failureMessage(options.hostname, "interrupted"));
        })
      ),
      Effect.exit
    );

    if (Exit.isFailure(exit)) {
      // Recorded by the interrupt handler already
      if (Cause.isInterruptedOnly(exit.cause)) {
        return yield* Effect.failCause(exit.cause);
      }
      const reason = Option.match(Cause.failureOption(exit.cause), {
        onNone: (): string => Cause.pretty(exit.cause),
        onSome: (e): string => e.message,
      });
      const reached = yield* tracker.current;
      yield* tracker.transition("FAILED");
      yield* logFail(`Backup failed after reaching ${reached}`);
      yield* runLog.append(`ERROR: ${reason}`);
      yield* notify(failureMessage(options.hostname, reason));
      return yield* Effect.failCause(exit.cause);
    }

    const { size, kept, pruned } = exit.value;
    yield* tracker.transition("DONE");
    yield* notify(
      successMessage(options.hostname, { size: formatBytes(size), kept: kept.length, file: names.encrypted })
    );
    yield* runLog.append(`${COMPLETION_PHRASE}: ${names.encrypted} (${formatBytes(size)})`);
    const elapsed = (yield* Clock.currentTimeMillis) - startedAt;
    yield* logSuccess(
      `Backup completed: ${names.encrypted} (${formatBytes(size)}) in ${formatDuration(elapsed)}`
    );

    return {
      artifact: names.encrypted,
      size,
      kept,
      pruned,
      warnings: yield* Ref.get(warnings),
      states: yield* tracker.history,
    };
  });

export const runPipeline = (
  config: BackupConfig,
  options: PipelineOptions
): Effect.Effect<RunReport, PipelineError, PipelineRequirements> =>
  Effect.flatMap(makeStateTracker(), (tracker) => runPipelineTracked(config, options, tracker));

export interface RunPlan {
  readonly artifact: string;
  readonly remote: string;
  readonly included: readonly AbsolutePath[];
  readonly missing: readonly AbsolutePath[];
  readonly maxKeep: number;
}

/** What `run` would do, without touching the lock, the disk or the remote. */
export const planRun = (config: BackupConfig, options: PipelineOptions): Effect.Effect<RunPlan> =>
  Effect.map(planArchive(config.backup.sources), (plan) => ({
    artifact: artifactNames(options.hostname, formatTimestamp(options.now)).encrypted,
    remote: config.backup.remote,
    included: plan.included,
    missing: plan.missing,
    maxKeep: config.backup.maxKeep,
  }));

