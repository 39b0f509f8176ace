import { afterEach } from "vitest";

afterEach(async () => {
  // Imported lazily so test files' vi.mock() calls apply before the app graph loads.
  const { closeTestServers } = await import("./src/test-utils.js");
  await closeTestServers();
});
