// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Passphrase encryption of backup archives with age (scrypt recipient,
 * ChaCha20-Poly1305 payload). Each encryption draws a fresh random salt
 * and file key, so the same input never produces the same ciphertext.
 * The key is derived from the passphrase alone; it is never stored.
 */

import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";
import { Readable, Writable } from "node:stream";
import { Decrypter, Encrypter } from "age-encryption";
import { Effect, Redacted, pipe } from "effect";
import {
  BackupError,
  ErrorCode,
  RestoreError,
  causeOf,
  errorMessage,
} from "../lib/errors";
import type { AbsolutePath } from "../lib/types";
import { deleteFileIfExists } from "./fs";

export interface EncryptOptions {
  readonly passphrase: Redacted.Redacted<string>;
  /** log2 of the scrypt N parameter */
  readonly workFactor: number;
}

export const encryptBytes = (
  plaintext: Uint8Array,
  options: EncryptOptions
): Effect.Effect<Uint8Array, BackupError> =>
  Effect.tryPromise({
    try: (): Promise<Uint8Array> => {
      const enc = new Encrypter();
      enc.setPassphrase(Redacted.value(options.passphrase));
      enc.setScryptWorkFactor(options.workFactor);
      return enc.encrypt(plaintext);
    },
    catch: (e): BackupError =>
      new BackupError({
        code: ErrorCode.ENCRYPTION_FAILED,
        message: `Encryption failed: ${errorMessage(e)}`,
        ...causeOf(e),
      }),
  });

/** A wrong passphrase and a tampered payload are indistinguishable here. */
export const decryptBytes = (
  ciphertext: Uint8Array,
  passphrase: Redacted.Redacted<string>
): Effect.Effect<Uint8Array, RestoreError> =>
  Effect.tryPromise({
    try: (): Promise<Uint8Array> => {
      const dec = new Decrypter();
      dec.addPassphrase(Redacted.value(passphrase));
      return dec.decrypt(ciphertext);
    },
    catch: (e): RestoreError =>
      new RestoreError({
        code: ErrorCode.DECRYPTION_FAILED,
        message: `Decryption failed (wrong passphrase or corrupted file): ${errorMessage(e)}`,
        ...causeOf(e),
      }),
  });

const openInput = (path: AbsolutePath): ReadableStream<Uint8Array> =>
  Readable.toWeb(createReadStream(path));

/** Resolves once the file exists, so cleanup never races its creation. */
const openOutput = async (path: AbsolutePath): Promise<WritableStream<Uint8Array>> =>
  Writable.toWeb((await open(path, "w")).createWriteStream());

/** A partial output file is removed when the stream fails. */
const streamToFile = <E>(
  output: AbsolutePath,
  source: () => Promise<ReadableStream<Uint8Array>>,
  onError: (e: unknown) => E
): Effect.Effect<void, E> =>
  pipe(
    Effect.tryPromise({
      try: async (): Promise<void> => {
        const stream = await source();
        await stream.pipeTo(await openOutput(output));
      },
      catch: onError,
    }),
    Effect.tapError(() =>
      Effect.catchAll(deleteFileIfExists(output), (e) =>
        Effect.logWarning(`Failed to remove partial output: ${e.message}`)
      )
    )
  );

/**
 * Encrypt `input` into `output`, streaming in age's 64 KiB chunks so archive
 * size is bounded by disk, not memory. An empty passphrase is rejected up front.
 */
export const encryptFile = (
  input: AbsolutePath,
  output: AbsolutePath,
  options: EncryptOptions
): Effect.Effect<void, BackupError> =>
  Effect.gen(function* () {
    if (Redacted.value(options.passphrase).length === 0) {
      return yield* Effect.fail(
        new BackupError({
          code: ErrorCode.ENCRYPTION_FAILED,
          message: "Encryption passphrase is empty",
        })
      );
    }
    yield* streamToFile(
      output,
      (): Promise<ReadableStream<Uint8Array>> => {
        const enc = new Encrypter();
        enc.setPassphrase(Redacted.value(options.passphrase));
        enc.setScryptWorkFactor(options.workFactor);
        return enc.encrypt(openInput(input));
      },
      (e): BackupError =>
        new BackupError({
          code: ErrorCode.ENCRYPTION_FAILED,
          message: `Encryption of ${input} failed: ${errorMessage(e)}`,
          ...causeOf(e),
        })
    );
  });

/** Streams like encryptFile; a bad passphrase or a tampered chunk fails mid-stream. */
export const decryptFile = (
  input: AbsolutePath,
  output: AbsolutePath,
  passphrase: Redacted.Redacted<string>
): Effect.Effect<void, RestoreError> =>
  streamToFile(
    output,
    (): Promise<ReadableStream<Uint8Array>> => {
      const dec = new Decrypter();
      dec.addPassphrase(Redacted.value(passphrase));
      return dec.decrypt(openInput(input));
    },
    (e): RestoreError =>
      new RestoreError({
        code: ErrorCode.DECRYPTION_FAILED,
        message: `Decryption failed (wrong passphrase or corrupted file): ${errorMessage(e)}`,
        ...causeOf(e),
      })
  );
