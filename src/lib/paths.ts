// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Path resolution for user-supplied paths and the default locations the
 * tool looks in. Relative input is resolved against the working directory.
 */

import { basename, normalize, resolve } from "node:path";
import { Effect } from "effect";
import { ConfigError, ErrorCode } from "./errors";
import { type AbsolutePath, parentPath, path, pathJoin } from "./types";

export const CONFIG_FILE_NAME = "vps-backup.toml";

export const SYSTEM_CONFIG_PATH: AbsolutePath = path("/etc/vps-backup/vps-backup.toml");

export const userConfigPath = (home: string): string =>
  pathJoin(home, ".config/vps-backup", CONFIG_FILE_NAME);

/** Default restore target, unique per process like the interactive tool's. */
export const defaultRestoreDir = (pid: number): AbsolutePath =>
  pathJoin(path("/tmp"), `vps-restore-${pid}`);

const hasNullByte = (p: string): boolean => p.includes("\x00");

const resolveToAbsolute = (p: string): AbsolutePath => {
  const normalized = normalize(p);
  return (
    normalized.startsWith("/") ? normalized : resolve(process.cwd(), normalized)
  ) as AbsolutePath;
};

/** Use for all user-provided or config-file paths. */
export const toAbsolutePathEffect = (p: string): Effect.Effect<AbsolutePath, ConfigError> =>
  hasNullByte(p)
    ? Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Invalid path contains null byte: ${p}`,
        })
      )
    : Effect.succeed(resolveToAbsolute(p));

/**
 * Parent directory and leaf name of a source path, for `tar -C parent leaf`.
 * Trailing slashes are ignored so `/etc/nginx/` archives as `nginx`.
 */
export const splitSourcePath = (
  source: AbsolutePath
): { readonly parent: AbsolutePath; readonly leaf: string } => ({
  parent: parentPath(source),
  leaf: basename(source) || ".",
});
