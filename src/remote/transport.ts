// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Remote object storage as an Effect service.
 * Destinations are opaque `<remote>:<path>` strings; objects are stored flat
 * under them. Uses Context.GenericTag for isolatedDeclarations compatibility.
 */

import { Context, type Effect, type Option } from "effect";
import type { RemoteError } from "../lib/errors";
import type { AbsolutePath } from "../lib/types";

export interface RemoteObject {
  readonly name: string;
  readonly size: number;
  readonly modified: Date;
}

export interface RemoteTransportService {
  /** Copy a local file into `remoteDir`, keeping its base name. */
  readonly upload: (localFile: AbsolutePath, remoteDir: string) => Effect.Effect<void, RemoteError>;
  /** Copy `remoteDir/name` into `localDir`. */
  readonly download: (
    remoteDir: string,
    name: string,
    localDir: AbsolutePath
  ) => Effect.Effect<void, RemoteError>;
  /** Files directly under `remoteDir`; an absent directory lists as empty. */
  readonly list: (remoteDir: string) => Effect.Effect<readonly RemoteObject[], RemoteError>;
  /** Size in bytes, None when the object does not exist. */
  readonly size: (
    remoteDir: string,
    name: string
  ) => Effect.Effect<Option.Option<number>, RemoteError>;
  readonly remove: (remoteDir: string, name: string) => Effect.Effect<void, RemoteError>;
  /** Reachability probe for the remote that holds `remoteDir`. */
  readonly check: (remoteDir: string) => Effect.Effect<void, RemoteError>;
}

/**
 * RemoteTransport tag identifier type.
 */
export interface RemoteTransport {
  readonly _tag: "RemoteTransport";
}

export const RemoteTransport: Context.Tag<RemoteTransport, RemoteTransportService> =
  Context.GenericTag<RemoteTransport, RemoteTransportService>("vps-backup/RemoteTransport");

/** `gdrive:` + `x` → `gdrive:x`; `gdrive:backups` + `x` → `gdrive:backups/x`. */
export const remoteObjectPath = (remoteDir: string, name: string): string =>
  remoteDir.endsWith(":") || remoteDir.endsWith("/") ? `${remoteDir}${name}` : `${remoteDir}/${name}`;

/** The `<remote>:` prefix of a destination, e.g. `gdrive:` for `gdrive:vps-backup`. */
export const remoteRoot = (remoteDir: string): string => {
  const colon = remoteDir.indexOf(":");
  return colon < 0 ? remoteDir : remoteDir.slice(0, colon + 1);
};
