/**
 * Harvest context for CLI commands
 */

import { loadConfig } from "../../config.js";
import {
  createHarvestContext,
  type HarvestContext,
} from "../../services/harvest/index.js";

/**
 * Build the harvest context from the environment, run `action` with it and
 * close the state database afterwards
 */
export async function withHarvestContext<T>(
  action: (context: HarvestContext) => Promise<T>
): Promise<T> {
  const context = await createHarvestContext(loadConfig());
  try {
    return await action(context);
  } finally {
    await context.db.destroy();
  }
}
