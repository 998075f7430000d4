#!/usr/bin/env node
/**
 * Daily meal plan job
 *
 * Triggered by cron once per run, e.g. weekdays at 07:00:
 *   0 7 * * 1-5  cd /opt/meal-plan-relay && node dist/jobs/meal-plan.js
 *
 * Exit codes: 0 sent or skipped, 1 run failed, 2 configuration error.
 */

import dotenv from "dotenv";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { createRunController, exitCodeFor, EXIT_CODES, type RunController } from "../relay/index.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

dotenv.config({ path: join(__dirname, "../../.env") });

async function main(): Promise<number> {
  console.log(`[MealPlan] 🤖 Starting - ${new Date().toISOString()}`);

  let controller: RunController;
  try {
    controller = createRunController(loadConfig());
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[MealPlan] Configuration error: ${error.message}`);
      return EXIT_CODES.config;
    }
    throw error;
  }

  const report = await controller.run();
  console.log(`[MealPlan] Finished: ${report.status} (${report.date})`);
  return exitCodeFor(report);
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    console.error("[MealPlan] Unhandled error:", error);
    process.exit(EXIT_CODES.failed);
  });
