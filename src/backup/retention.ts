// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Retention: keep the `maxKeep` newest artifacts of this host, delete the
 * rest together with their checksum companions. Names sort newest-first
 * because the timestamp is fixed-width and zero-padded.
 *
 * `maxKeep <= 0` disables pruning. Artifacts younger than `minAgeHours`
 * (judged by the timestamp in the name) survive regardless of position,
 * which keeps a snapshot alive while a concurrent restore fetches it.
 * Names that do not parse are never touched.
 */

import { Array as Arr, Effect, Option, Order, pipe } from "effect";
import type { RemoteError } from "../lib/errors";
import { RemoteTransport } from "../remote/transport";
import { checksumNameFor, parseArtifactName } from "./naming";
import { PipelineWarning } from "./state";

export interface RetentionPolicy {
  readonly maxKeep: number;
  readonly minAgeHours: number;
  readonly now: Date;
}

export interface RetentionPlan {
  /** Newest first */
  readonly keep: readonly string[];
  /** Newest first */
  readonly prune: readonly string[];
}

export interface RetentionResult {
  readonly kept: readonly string[];
  readonly pruned: readonly string[];
  readonly warnings: readonly PipelineWarning[];
}

const HOUR_MS = 60 * 60 * 1000;

const byNameDescending: Order.Order<string> = Order.reverse(Order.string);

/** Pure selection over the names in the remote directory. */
export const planRetention = (
  names: readonly string[],
  hostname: string,
  policy: RetentionPolicy
): RetentionPlan => {
  const artifacts = pipe(
    names,
    Arr.filterMap(parseArtifactName),
    Arr.filter((a) => a.hostname === hostname),
    Arr.sort(Order.mapInput(byNameDescending, (a: { readonly name: string }) => a.name))
  );

  if (policy.maxKeep <= 0) {
    return { keep: artifacts.map((a) => a.name), prune: [] };
  }

  const [newest, beyond] = Arr.splitAt(artifacts, policy.maxKeep);
  const minAgeMs = policy.minAgeHours * HOUR_MS;
  const [tooYoung, eligible] = Arr.partition(
    beyond,
    (a) => policy.now.getTime() - a.createdAt.getTime() >= minAgeMs
  );

  return {
    keep: [...newest, ...tooYoung].map((a) => a.name),
    prune: eligible.map((a) => a.name),
  };
};

const removeObject = (
  remoteDir: string,
  name: string
): Effect.Effect<Option.Option<PipelineWarning>, never, RemoteTransport> =>
  Effect.gen(function* () {
    const transport = yield* RemoteTransport;
    return yield* pipe(
      transport.remove(remoteDir, name),
      Effect.as(Option.none<PipelineWarning>()),
      Effect.catchAll((e: RemoteError) =>
        Effect.as(
          Effect.logWarning(`Failed to delete ${name}: ${e.message}`),
          Option.some(PipelineWarning.PruneWarning({ object: name, message: e.message }))
        )
      )
    );
  });

/**
 * Apply the policy to `remoteDir`. Never fails: a listing or deletion
 * error becomes a PruneWarning and the remaining candidates are still tried.
 */
export const pruneRemote = (
  remoteDir: string,
  hostname: string,
  policy: RetentionPolicy
): Effect.Effect<RetentionResult, never, RemoteTransport> =>
  Effect.gen(function* () {
    const transport = yield* RemoteTransport;
    const listing = yield* Effect.either(transport.list(remoteDir));
    if (listing._tag === "Left") {
      yield* Effect.logWarning(`Cannot list ${remoteDir}: ${listing.left.message}`);
      return {
        kept: [],
        pruned: [],
        warnings: [PipelineWarning.PruneWarning({ object: remoteDir, message: listing.left.message })],
      };
    }

    const names = listing.right.map((o) => o.name);
    const present = new Set(names);
    const plan = planRetention(names, hostname, policy);

    const outcomes = yield* Effect.forEach(plan.prune, (name) =>
      Effect.gen(function* () {
        yield* Effect.logInfo(`Pruning ${name}`);
        const artifactWarning = yield* removeObject(remoteDir, name);
        const companion = checksumNameFor(name);
        const companionWarning = present.has(companion)
          ? yield* removeObject(remoteDir, companion)
          : Option.none<PipelineWarning>();
        return { name, artifactWarning, companionWarning };
      })
    );

    return {
      kept: plan.keep,
      pruned: outcomes.filter((o) => Option.isNone(o.artifactWarning)).map((o) => o.name),
      warnings: Arr.getSomes(outcomes.flatMap((o) => [o.artifactWarning, o.companionWarning])),
    };
  });
