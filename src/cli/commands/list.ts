// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { BackupConfig } from "../../config/schema";
import type { RemoteError } from "../../lib/errors";
import { formatBytes, formatLogTimestamp, padEnd } from "../../lib/format";
import type { RemoteTransport } from "../../remote/transport";
import { type SnapshotInfo, listSnapshots } from "../../restore/restore";
import { emit } from "./output";

export interface ListOptions {
  readonly config: BackupConfig;
  readonly format: LogFormat;
}

export const snapshotLines = (snapshots: readonly SnapshotInfo[]): readonly string[] => {
  if (snapshots.length === 0) {
    return ["No backups found"];
  }
  const width = Math.max(...snapshots.map((s) => s.name.length));
  return snapshots.map(
    (s) =>
      `${padEnd(s.name, width)}  ${padEnd(formatBytes(s.size), 10)}  ${formatLogTimestamp(s.modified)}  ${s.hasChecksum ? "sha256" : "no checksum"}`
  );
};

export const executeList = (
  options: ListOptions
): Effect.Effect<void, RemoteError, RemoteTransport> =>
  Effect.gen(function* () {
    const snapshots = yield* listSnapshots(options.config);
    yield* emit(
      options.format,
      snapshots.map((s) => ({
        name: s.name,
        size: s.size,
        modified: s.modified.toISOString(),
        checksum: s.hasChecksum,
      })),
      () => snapshotLines(snapshots)
    );
  });
