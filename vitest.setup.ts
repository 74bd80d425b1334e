/**
 * Vitest Global Setup
 *
 * Resets the config cache so vi.stubEnv() values set at file level, in
 * beforeAll (integration tests, before build()) or inside a test are picked
 * up on the next config access.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep test output quiet unless a test asks otherwise
process.env.LOG_LEVEL ??= "warn";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
