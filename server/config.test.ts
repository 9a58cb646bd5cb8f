import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "./config";

function configErrorOf(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error("expected loadConfig to fail");
}

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: "development",
      restaurantDataFile: "data/restaurants.json",
      defaultSortKey: "bestMatch",
      sortOpenFirst: true,
      logLevel: "debug",
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        NODE_ENV: "production",
        RESTAURANT_DATA_FILE: "/srv/list.json",
        DEFAULT_SORT_KEY: "distance",
        SORT_OPEN_FIRST: "0",
        LOG_LEVEL: "warn",
      }),
    ).toEqual({
      nodeEnv: "production",
      restaurantDataFile: "/srv/list.json",
      defaultSortKey: "distance",
      sortOpenFirst: false,
      logLevel: "warn",
    });
  });

  it("logs at info by default in production", () => {
    expect(loadConfig({ NODE_ENV: "production" }).logLevel).toBe("info");
  });

  it("treats empty strings as unset", () => {
    const config = loadConfig({ DEFAULT_SORT_KEY: "", LOG_LEVEL: "", RESTAURANT_DATA_FILE: "" });

    expect(config.defaultSortKey).toBe("bestMatch");
    expect(config.logLevel).toBe("debug");
    expect(config.restaurantDataFile).toBe("data/restaurants.json");
  });

  it("lists every invalid variable", () => {
    const error = configErrorOf({ DEFAULT_SORT_KEY: "cheapest", SORT_OPEN_FIRST: "yes" });

    expect(error.details).toEqual([
      'DEFAULT_SORT_KEY: Unknown sort key "cheapest"',
      "SORT_OPEN_FIRST: Invalid enum value. Expected 'true' | 'false' | '1' | '0', received 'yes'",
    ]);
    expect(error.message).toBe(
      "Invalid configuration:\n" +
        '  - DEFAULT_SORT_KEY: Unknown sort key "cheapest"\n' +
        "  - SORT_OPEN_FIRST: Invalid enum value. Expected 'true' | 'false' | '1' | '0', received 'yes'",
    );
  });
});
