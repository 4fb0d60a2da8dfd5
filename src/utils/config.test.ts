import { loadConfig } from "./config";
import { ConfigurationError } from "./errors";

describe("loadConfig", () => {
  it("should apply defaults", () => {
    const config = loadConfig({});
    expect(config.apiPort).toBe(3000);
    expect(config.dashboardPort).toBe(3003);
    expect(config.datasetPath).toBe("data/raw/grades.csv");
    expect(config.passMark).toBe(10);
    expect(config.referenceDate.toISOString()).toBe("2025-09-01T00:00:00.000Z");
    expect(config.studentCount).toBe(1200);
    expect(config.allowedOrigins).toEqual(["http://localhost:3000", "http://localhost:3003"]);
  });

  it("should convert and split values from the environment", () => {
    const config = loadConfig({
      API_PORT: "4100",
      PASS_MARK: "12",
      MISSING_RATE: "0.1",
      REFERENCE_DATE: "2024-01-15",
      ALLOWED_ORIGINS: "http://a.test, http://b.test,",
    });
    expect(config.apiPort).toBe(4100);
    expect(config.passMark).toBe(12);
    expect(config.missingRate).toBe(0.1);
    expect(config.referenceDate.toISOString()).toBe("2024-01-15T00:00:00.000Z");
    expect(config.allowedOrigins).toEqual(["http://a.test", "http://b.test"]);
  });

  it("should fail on an invalid value", () => {
    expect(() => loadConfig({ PASS_MARK: "25" })).toThrow(ConfigurationError);
    expect(() => loadConfig({ API_PORT: "not-a-port" })).toThrow(/^Invalid environment: "API_PORT"/);
  });
});
