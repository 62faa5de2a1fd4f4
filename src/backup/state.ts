// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Pipeline states, the legal transitions between them, and the non-fatal
 * warnings a run collects on the way.
 */

import { Data, Effect, Match, Ref, pipe } from "effect";

// ============================================================================
// States
// ============================================================================

export const PIPELINE_STATES = [
  "INIT",
  "LOCKED",
  "SPACE_OK",
  "ARCHIVED",
  "ENCRYPTED",
  "HASHED",
  "UPLOADED",
  "PRUNED",
  "DONE",
  "FAILED",
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

type TerminalState = "DONE" | "FAILED";

const FORWARD: Readonly<Record<Exclude<PipelineState, TerminalState>, PipelineState>> = {
  INIT: "LOCKED",
  LOCKED: "SPACE_OK",
  SPACE_OK: "ARCHIVED",
  ARCHIVED: "ENCRYPTED",
  ENCRYPTED: "HASHED",
  HASHED: "UPLOADED",
  UPLOADED: "PRUNED",
  PRUNED: "DONE",
};

export const isTerminal = (state: PipelineState): state is TerminalState =>
  state === "DONE" || state === "FAILED";

/** One step forward, or FAILED from any non-terminal state. */
export const canTransition = (from: PipelineState, to: PipelineState): boolean =>
  !isTerminal(from) && (to === "FAILED" || FORWARD[from] === to);

export interface StateTracker {
  readonly current: Effect.Effect<PipelineState>;
  /** Every state entered so far, starting with INIT. */
  readonly history: Effect.Effect<readonly PipelineState[]>;
  /** Dies on an illegal transition: that is a bug in the orchestrator. */
  readonly transition: (to: PipelineState) => Effect.Effect<void>;
}

export const makeStateTracker = (): Effect.Effect<StateTracker> =>
  Effect.gen(function* () {
    const ref = yield* Ref.make<readonly PipelineState[]>(["INIT"]);
    const current = Effect.map(Ref.get(ref), (h): PipelineState => h[h.length - 1] ?? "INIT");

    return {
      current,
      history: Ref.get(ref),
      transition: (to: PipelineState): Effect.Effect<void> =>
        Effect.flatMap(current, (from) =>
          canTransition(from, to)
            ? Effect.zipRight(
                Ref.update(ref, (h) => [...h, to]),
                Effect.logDebug(`state ${from} -> ${to}`)
              )
            : Effect.dieMessage(`Illegal pipeline transition ${from} -> ${to}`)
        ),
    };
  });

// ============================================================================
// Warnings
// ============================================================================

export type PipelineWarning = Data.TaggedEnum<{
  SourceMissing: { readonly path: string };
  PruneWarning: { readonly object: string; readonly message: string };
  NotifyWarning: { readonly message: string };
  ChecksumUploadWarning: { readonly message: string };
}>;

export const PipelineWarning: Data.TaggedEnum.Constructor<PipelineWarning> =
  Data.taggedEnum<PipelineWarning>();

export const describeWarning = (warning: PipelineWarning): string =>
  pipe(
    Match.value(warning),
    Match.tag("SourceMissing", ({ path }) => `source not found, skipped: ${path}`),
    Match.tag("PruneWarning", ({ object, message }) => `failed to prune ${object}: ${message}`),
    Match.tag("NotifyWarning", ({ message }) => `notification failed: ${message}`),
    Match.tag("ChecksumUploadWarning", ({ message }) => `checksum upload failed: ${message}`),
    Match.exhaustive
  );
