// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Artifact naming. These names are the interchange format between the
 * backup pipeline and restore tooling; they must stay byte-for-byte stable:
 *
 *   backup-<hostname>-<YYYYMMDD-HHMMSS>.tar.gz        (scratch only)
 *   backup-<hostname>-<YYYYMMDD-HHMMSS>.tar.gz.enc    (persisted)
 *   backup-<hostname>-<YYYYMMDD-HHMMSS>.tar.gz.enc.sha256
 */

import { Option, pipe } from "effect";

export const ARTIFACT_PREFIX = "backup-";
export const ARCHIVE_SUFFIX = ".tar.gz";
export const ENCRYPTED_SUFFIX = ".tar.gz.enc";
export const CHECKSUM_SUFFIX = ".sha256";

const ARTIFACT_PATTERN = /^backup-(.+)-(\d{8})-(\d{6})\.tar\.gz\.enc$/;

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** Local time, second precision, zero padded: `20250101-120000`. */
export const formatTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}-` +
  `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;

export interface ArtifactNames {
  readonly archive: string;
  readonly encrypted: string;
  readonly checksum: string;
}

export const artifactNames = (hostname: string, timestamp: string): ArtifactNames => {
  const archive = `${ARTIFACT_PREFIX}${hostname}-${timestamp}${ARCHIVE_SUFFIX}`;
  const encrypted = `${archive}.enc`;
  return { archive, encrypted, checksum: `${encrypted}${CHECKSUM_SUFFIX}` };
};

export const checksumNameFor = (encryptedName: string): string =>
  `${encryptedName}${CHECKSUM_SUFFIX}`;

/** `backup-x.tar.gz.enc` → `backup-x.tar.gz` */
export const archiveNameFor = (encryptedName: string): string =>
  encryptedName.endsWith(".enc") ? encryptedName.slice(0, -".enc".length) : encryptedName;

export interface ParsedArtifact {
  readonly name: string;
  readonly hostname: string;
  readonly timestamp: string;
  /** Creation time decoded from the name, local time */
  readonly createdAt: Date;
}

const parseStamp = (day: string, time: string): Option.Option<Date> => {
  const n = (s: string, from: number, to: number): number => Number.parseInt(s.slice(from, to), 10);
  const date = new Date(
    n(day, 0, 4),
    n(day, 4, 6) - 1,
    n(day, 6, 8),
    n(time, 0, 2),
    n(time, 2, 4),
    n(time, 4, 6)
  );
  return Number.isNaN(date.getTime()) ? Option.none() : Option.some(date);
};

/** None for anything that is not an encrypted artifact name. */
export const parseArtifactName = (name: string): Option.Option<ParsedArtifact> =>
  pipe(
    Option.fromNullable(ARTIFACT_PATTERN.exec(name)),
    Option.flatMap(([, hostname, day, time]) =>
      hostname !== undefined && day !== undefined && time !== undefined
        ? Option.map(
            parseStamp(day, time),
            (createdAt): ParsedArtifact => ({
              name,
              hostname,
              timestamp: `${day}-${time}`,
              createdAt,
            })
          )
        : Option.none()
    )
  );

export const isEncryptedArtifact = (name: string): boolean =>
  name.startsWith(ARTIFACT_PREFIX) && name.endsWith(ENCRYPTED_SUFFIX);
