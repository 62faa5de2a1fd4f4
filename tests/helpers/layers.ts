// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Test helpers for providing Effect platform layers in tests.
 * NodeContext.layer provides FileSystem.FileSystem, CommandExecutor.CommandExecutor,
 * Path, and Terminal services from @effect/platform-node.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Layer, Logger, Option, Schema } from "effect";
import { type AbsolutePath, AbsolutePathSchema } from "../../src/lib/types";

/**
 * Test layer providing all platform services. Log output is dropped so
 * test reports stay readable.
 */
export const TestLayer: Layer.Layer<NodeContext.NodeContext> = Layer.merge(
  NodeContext.layer,
  Logger.remove(Logger.defaultLogger)
);

/**
 * Run an effect in tests with platform services provided.
 */
export const runTest = <A, E>(effect: Effect.Effect<A, E, NodeContext.NodeContext>): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(TestLayer)));

/**
 * Run an effect in tests and return the Exit value.
 */
export const runTestExit = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<Exit.Exit<A, E>> => Effect.runPromiseExit(effect.pipe(Effect.provide(TestLayer)));

export const toAbsolute: (s: string) => AbsolutePath = Schema.decodeSync(AbsolutePathSchema);

/** Fresh directory under the OS temp dir. */
export const makeTempDir = async (prefix: string): Promise<AbsolutePath> =>
  toAbsolute(await mkdtemp(join(tmpdir(), `vps-backup-${prefix}-`)));

export const removeDir = (dir: string): Promise<void> => rm(dir, { recursive: true, force: true });

/** The typed failure of an Exit, if it failed with one. */
export const failureOf = <A, E>(exit: Exit.Exit<A, E>): Option.Option<E> =>
  Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();
