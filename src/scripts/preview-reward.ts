// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@scripts/preview-reward`
 * Purpose: CLI entry point for the reward preview. Zero logic; delegates to the job module.
 * Scope: Process lifecycle (stdout, exit codes) only. Does not contain business logic or wiring.
 * Invariants: CLI = zero wiring, zero logic.
 * Side-effects: IO
 * Links: src/bootstrap/jobs/previewReward.job.ts
 * @public
 */

import { runPreviewRewardJob } from "@/bootstrap/jobs/previewReward.job";

runPreviewRewardJob()
  .then((report) => {
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
    process.exit(0);
  })
  .catch((error: unknown) => {
    process.stderr.write(
      `preview-reward failed: ${error instanceof Error ? error.message : String(error)}\n`
    );
    process.exit(1);
  });
