// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The backup run. `--dry-run` resolves the plan from the configuration
 * and the filesystem alone and prints it.
 */

import { Clock, Effect } from "effect";
import type { LogFormat } from "../../config/field-values";
import type { BackupConfig } from "../../config/schema";
import {
  type PipelineError,
  type PipelineRequirements,
  type RunPlan,
  type RunReport,
  planRun,
  runPipeline,
} from "../../backup/pipeline";
import { describeWarning } from "../../backup/state";
import { emit } from "./output";

export interface RunCommandOptions {
  readonly config: BackupConfig;
  readonly hostname: string;
  readonly format: LogFormat;
  readonly dryRun: boolean;
}

const planLines = (plan: RunPlan): readonly string[] => [
  `Artifact:  ${plan.artifact}`,
  `Remote:    ${plan.remote}`,
  `Retention: ${plan.maxKeep > 0 ? `keep ${plan.maxKeep}` : "unlimited"}`,
  ...plan.included.map((p) => `  + ${p}`),
  ...plan.missing.map((p) => `  - ${p} (missing, skipped)`),
];

const reportJson = (report: RunReport): Record<string, unknown> => ({
  artifact: report.artifact,
  size: report.size,
  kept: report.kept,
  pruned: report.pruned,
  warnings: report.warnings.map(describeWarning),
  states: report.states,
});

export const executeRun = (
  options: RunCommandOptions
): Effect.Effect<void, PipelineError, PipelineRequirements> =>
  Effect.gen(function* () {
    const now = new Date(yield* Clock.currentTimeMillis);
    const pipelineOptions = { hostname: options.hostname, now };

    if (options.dryRun) {
      const plan = yield* planRun(options.config, pipelineOptions);
      return yield* emit(options.format, { dryRun: true, ...plan }, () => planLines(plan));
    }

    const report = yield* runPipeline(options.config, pipelineOptions);
    // Pretty output is the pipeline's own log
    yield* emit(options.format, reportJson(report), () => []);
  });
