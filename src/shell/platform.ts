// PURITY: SHELL (reads process.platform)
// COMPLEXITY: O(1)

import { createPlatform, detectPlatform } from "../core/platform.js";
import type { Platform } from "../core/models.js";

/**
 * Platform of the running Node.js process.
 *
 * @pure false
 */
export const hostPlatform = (): Platform =>
	createPlatform(detectPlatform(process.platform));
