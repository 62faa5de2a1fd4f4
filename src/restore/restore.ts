// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Restore side of the artifact format: list snapshots, restore one into a
 * directory, or verify one without keeping anything. Restore takes no lock
 * and never deletes remote objects.
 */

import { Array as Arr, Effect, Option, Order, type Scope, pipe } from "effect";
import type { BackupConfig } from "../config/schema";
import { ErrorCode, type RemoteError, RestoreError, type SystemError } from "../lib/errors";
import { type AbsolutePath, pathJoin } from "../lib/types";
import { type RemoteObject, RemoteTransport } from "../remote/transport";
import { decryptFile } from "../system/age";
import { extractArchive, listArchive } from "../system/archive";
import {
  deleteDirectory,
  deleteFileIfExists,
  ensureDirectory,
  readFile,
  sha256File,
} from "../system/fs";
import { archiveNameFor, checksumNameFor, isEncryptedArtifact, parseArtifactName } from "../backup/naming";

export type RestoreFailure = RestoreError | RemoteError | SystemError;

export interface SnapshotInfo {
  readonly name: string;
  readonly size: number;
  readonly modified: Date;
  /** Host encoded in the name */
  readonly hostname: Option.Option<string>;
  readonly hasChecksum: boolean;
}

export type ChecksumStatus = "verified" | "absent";

export interface RestoreReport {
  readonly name: string;
  readonly target: AbsolutePath;
  readonly checksum: ChecksumStatus;
}

export interface VerifyReport {
  readonly name: string;
  readonly members: number;
  readonly checksum: ChecksumStatus;
}

export const LATEST = "latest";

// ============================================================================
// Listing
// ============================================================================

/** Name timestamp when it parses, upload time otherwise. */
const snapshotTime = (s: SnapshotInfo): number =>
  pipe(
    parseArtifactName(s.name),
    Option.match({
      onNone: (): number => s.modified.getTime(),
      onSome: (a): number => a.createdAt.getTime(),
    })
  );

const newestFirst: Order.Order<SnapshotInfo> = Order.combine(
  Order.reverse(Order.mapInput(Order.number, snapshotTime)),
  Order.reverse(Order.mapInput(Order.string, (s: SnapshotInfo) => s.name))
);

export const toSnapshots = (objects: readonly RemoteObject[]): readonly SnapshotInfo[] => {
  const names = new Set(objects.map((o) => o.name));
  return pipe(
    objects,
    Arr.filter((o) => isEncryptedArtifact(o.name)),
    Arr.map(
      (o): SnapshotInfo => ({
        name: o.name,
        size: o.size,
        modified: o.modified,
        hostname: Option.map(parseArtifactName(o.name), (a) => a.hostname),
        hasChecksum: names.has(checksumNameFor(o.name)),
      })
    ),
    Arr.sort(newestFirst)
  );
};

/** Snapshots of every host in the remote directory, newest first. */
export const listSnapshots = (
  config: BackupConfig
): Effect.Effect<readonly SnapshotInfo[], RemoteError, RemoteTransport> =>
  Effect.gen(function* () {
    const transport = yield* RemoteTransport;
    return toSnapshots(yield* transport.list(config.backup.remote));
  });

const notFound = (message: string): RestoreError =>
  new RestoreError({ code: ErrorCode.BACKUP_NOT_FOUND, message });

/** An exact artifact name, or `latest` for the newest snapshot of `hostname`. */
export const selectSnapshot = (
  config: BackupConfig,
  selection: string,
  hostname: string
): Effect.Effect<SnapshotInfo, RestoreError | RemoteError, RemoteTransport> =>
  Effect.gen(function* () {
    const snapshots = yield* listSnapshots(config);
    const found =
      selection === LATEST
        ? Arr.findFirst(snapshots, (s) => Option.contains(s.hostname, hostname))
        : Arr.findFirst(snapshots, (s) => s.name === selection);
    return yield* Option.match(found, {
      onNone: () =>
        Effect.fail(
          notFound(
            selection === LATEST
              ? `No backups for host ${hostname} in ${config.backup.remote}`
              : `Backup not found in ${config.backup.remote}: ${selection}`
          )
        ),
      onSome: (s) => Effect.succeed(s),
    });
  });

// ============================================================================
// Download, verify, decrypt
// ============================================================================

/** First whitespace-separated token, lowercased; tolerates `sha256sum` output. */
export const parseChecksumFile = (content: string): Option.Option<string> =>
  pipe(
    Option.fromNullable(content.trim().split(/\s+/)[0]),
    Option.map((t) => t.toLowerCase()),
    Option.filter((t) => /^[0-9a-f]{64}$/.test(t))
  );

const verifyAgainstCompanion = (
  config: BackupConfig,
  snapshot: SnapshotInfo,
  encryptedPath: AbsolutePath,
  workDir: AbsolutePath
): Effect.Effect<ChecksumStatus, RestoreFailure, RemoteTransport> =>
  Effect.gen(function* () {
    if (!snapshot.hasChecksum) {
      yield* Effect.logWarning(`No checksum stored for ${snapshot.name}; skipping verification`);
      return "absent";
    }
    const transport = yield* RemoteTransport;
    const companion = checksumNameFor(snapshot.name);
    const companionPath = pathJoin(workDir, companion);
    yield* transport.download(config.backup.remote, companion, workDir);

    const expected = yield* pipe(
      readFile(companionPath),
      Effect.map(parseChecksumFile),
      Effect.ensuring(Effect.ignoreLogged(deleteFileIfExists(companionPath)))
    );
    const actual = yield* sha256File(encryptedPath);

    if (!Option.contains(expected, actual)) {
      return yield* Effect.fail(
        new RestoreError({
          code: ErrorCode.VERIFY_FAILED,
          message: `Checksum mismatch for ${snapshot.name}: expected ${Option.getOrElse(expected, () => "<unreadable>")}, got ${actual}`,
        })
      );
    }
    yield* Effect.logInfo(`Checksum verified: ${actual}`);
    return "verified";
  });

interface Fetched {
  readonly archivePath: AbsolutePath;
  readonly checksum: ChecksumStatus;
}

/** Download, verify and decrypt into `workDir`; the encrypted copy is always removed. */
const fetchAndDecrypt = (
  config: BackupConfig,
  snapshot: SnapshotInfo,
  workDir: AbsolutePath
): Effect.Effect<Fetched, RestoreFailure, RemoteTransport> =>
  Effect.gen(function* () {
    const transport = yield* RemoteTransport;
    const encryptedPath = pathJoin(workDir, snapshot.name);
    const archivePath = pathJoin(workDir, archiveNameFor(snapshot.name));

    return yield* pipe(
      Effect.gen(function* () {
        yield* Effect.logInfo(`Downloading ${snapshot.name}`);
        yield* transport.download(config.backup.remote, snapshot.name, workDir);
        const checksum = yield* verifyAgainstCompanion(config, snapshot, encryptedPath, workDir);
        yield* Effect.logInfo("Decrypting");
        yield* decryptFile(encryptedPath, archivePath, config.backup.passphrase);
        return { archivePath, checksum };
      }),
      Effect.ensuring(Effect.ignoreLogged(deleteFileIfExists(encryptedPath)))
    );
  });

// ============================================================================
// Operations
// ============================================================================

/** Download, verify, decrypt and extract a snapshot into `target`. */
export const restoreSnapshot = (
  config: BackupConfig,
  selection: string,
  hostname: string,
  target: AbsolutePath
): Effect.Effect<RestoreReport, RestoreFailure, RemoteTransport> =>
  Effect.gen(function* () {
    const snapshot = yield* selectSnapshot(config, selection, hostname);
    yield* ensureDirectory(target);

    const { archivePath, checksum } = yield* fetchAndDecrypt(config, snapshot, target);
    yield* pipe(
      Effect.logInfo(`Extracting into ${target}`),
      Effect.zipRight(extractArchive(archivePath, target)),
      Effect.ensuring(Effect.ignoreLogged(deleteFileIfExists(archivePath)))
    );
    return { name: snapshot.name, target, checksum };
  });

const verifyWorkDir = (tmpDir: AbsolutePath): Effect.Effect<AbsolutePath, SystemError, Scope.Scope> => {
  const dir = pathJoin(tmpDir, `verify-${process.pid}-${Date.now()}`);
  return Effect.acquireRelease(Effect.as(ensureDirectory(dir), dir), () =>
    Effect.ignoreLogged(deleteDirectory(dir))
  );
};

/** Decrypt and list a snapshot in a private directory that is always removed. */
export const verifySnapshot = (
  config: BackupConfig,
  selection: string,
  hostname: string
): Effect.Effect<VerifyReport, RestoreFailure, RemoteTransport> =>
  Effect.scoped(
    Effect.gen(function* () {
      const snapshot = yield* selectSnapshot(config, selection, hostname);
      const workDir = yield* verifyWorkDir(config.backup.tmpDir);
      const { archivePath, checksum } = yield* fetchAndDecrypt(config, snapshot, workDir);
      const members = yield* listArchive(archivePath);
      return { name: snapshot.name, members: members.length, checksum };
    })
  );
