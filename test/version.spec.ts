import { PTRGUARD_VERSION } from "../src/version";

describe("Version", () => {
  test("PTRGUARD_VERSION should be a semver", () => {
    expect(PTRGUARD_VERSION).toMatch(/^\d+\.\d+\.\d+/);
  });
});
