import { afterAll, afterEach, beforeAll } from "vitest";
import { server } from "@/tests/mocks/server";
import { resetEnvCache } from "@/config/env";

const TEST_SERVER_ENV: Record<string, string> = {
  SEARCH_PROVIDER_TIMEOUT_MS: "2000",
  SEARCH_MAX_RESULTS: "15",
  SEARCH_USER_AGENT: "research-lens-test/1.0"
};

for (const [key, value] of Object.entries(TEST_SERVER_ENV)) {
  if (process.env[key] === undefined) {
    process.env[key] = value;
  }
}

resetEnvCache();

beforeAll(() => {
  server.listen({ onUnhandledRequest: "error" });
});

afterEach(() => {
  server.resetHandlers();
});

afterAll(() => {
  server.close();
});
