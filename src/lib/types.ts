// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * An `AbsolutePath` and a remote object name are both strings, but only
 * the former may be handed to filesystem operations.
 */

import { dirname } from "node:path";
import { type Brand, type Effect, type ParseResult, Schema, type SchemaAST } from "effect";

export type AbsolutePath = string & Brand.Brand<"AbsolutePath">;
export type Hostname = string & Brand.Brand<"Hostname">;

const absolutePathMsg = (): string => "Path must be absolute (start with /)";
const hostnameMsg = (): string => "Hostname must be non-empty and contain no '/' or whitespace";

export const AbsolutePathSchema: Schema.BrandSchema<AbsolutePath, string, never> =
  Schema.String.pipe(
    Schema.filter((s): boolean => s.startsWith("/") && !s.includes("\x00"), {
      message: absolutePathMsg,
    }),
    Schema.brand("AbsolutePath")
  );

export const HostnameSchema: Schema.BrandSchema<Hostname, string, never> = Schema.String.pipe(
  Schema.filter((s): boolean => s.length > 0 && !/[\s/]/.test(s), { message: hostnameMsg }),
  Schema.brand("Hostname")
);

export const decodeAbsolutePath: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<AbsolutePath, ParseResult.ParseError, never> = Schema.decode(AbsolutePathSchema);

export const decodeHostname: (
  i: string,
  options?: SchemaAST.ParseOptions
) => Effect.Effect<Hostname, ParseResult.ParseError, never> = Schema.decode(HostnameSchema);

type AbsolutePathLiteral = `/${string}`;

/**
 * Compile-time validated `AbsolutePath` from a string literal.
 * For dynamic paths, use `decodeAbsolutePath` or `pathJoin`.
 */
export const path = <const S extends AbsolutePathLiteral>(literal: S): AbsolutePath =>
  literal as string as AbsolutePath;

/** Branded literal constructor. For dynamic input, use `decodeHostname`. */
export const hostname = <const S extends string>(literal: S): Hostname =>
  literal as string as Hostname;

const collapseSlashes = (s: string): string => s.replace(/\/{2,}/g, "/");

/** Join path segments, preserving `AbsolutePath` brand when the base is branded. */
export function pathJoin(base: AbsolutePath, ...segments: string[]): AbsolutePath;
export function pathJoin(base: string, ...segments: string[]): string;
export function pathJoin(base: string, ...segments: string[]): string {
  return segments.length === 0 ? base : collapseSlashes([base, ...segments].join("/"));
}

/** Append a suffix (e.g. `".enc"`), preserving `AbsolutePath` brand. */
export function pathWithSuffix(base: AbsolutePath, suffix: string): AbsolutePath;
export function pathWithSuffix(base: string, suffix: string): string;
export function pathWithSuffix(base: string, suffix: string): string {
  return `${base}${suffix}`;
}

/** Parent directory. The dirname of an absolute path is itself absolute. */
export const parentPath = (p: AbsolutePath): AbsolutePath => dirname(p) as AbsolutePath;
