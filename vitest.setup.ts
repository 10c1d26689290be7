/**
 * Vitest Global Setup
 *
 * Resets the config cache so vi.stubEnv() calls made at file level, in
 * beforeAll or in a test are picked up by the next config read.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// quiet request logging unless a test asks for it
process.env.LOG_LEVEL ??= "warn";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
