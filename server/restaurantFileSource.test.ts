import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { RestaurantFileSource, RestaurantLoadError } from "./restaurantFileSource";
import { logger } from "./utils/logger";

const sortingValues = {
  bestMatch: 402,
  newest: 150,
  ratingAverage: 4.5,
  distance: 3120,
  popularity: 8,
  averageProductPrice: 2050,
  deliveryCosts: 250,
  minCost: 2000,
};

let dir: string;

async function fixture(name: string, contents: string): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, contents, "utf-8");
  return filePath;
}

async function loadFailure(source: RestaurantFileSource): Promise<RestaurantLoadError> {
  try {
    await source.loadRestaurants();
  } catch (error) {
    if (error instanceof RestaurantLoadError) return error;
    throw error;
  }
  throw new Error("expected loadRestaurants to fail");
}

beforeAll(async () => {
  logger.silent = true;
  dir = await mkdtemp(path.join(os.tmpdir(), "restaurant-list-"));
});

afterAll(async () => {
  logger.silent = false;
  await rm(dir, { recursive: true, force: true });
});

describe("RestaurantFileSource", () => {
  it("loads and validates the restaurants", async () => {
    const filePath = await fixture(
      "valid.json",
      JSON.stringify({ restaurants: [{ name: "Saffron Street Kitchen", status: "open", sortingValues }] }),
    );

    await expect(new RestaurantFileSource(filePath).loadRestaurants()).resolves.toEqual([
      { name: "Saffron Street Kitchen", status: "open", sortingValues },
    ]);
  });

  it("reports a missing file as NotFound", async () => {
    const missing = path.join(dir, "missing.json");
    const error = await loadFailure(new RestaurantFileSource(missing));

    expect(error.reason).toBe("NotFound");
    expect(error.filePath).toBe(missing);
    expect(error.message).toBe(`Restaurant data file not found: ${missing}`);
  });

  it("reports broken JSON as JSONParseError", async () => {
    const filePath = await fixture("broken.json", "{ restaurants: ");
    const error = await loadFailure(new RestaurantFileSource(filePath));

    expect(error.reason).toBe("JSONParseError");
    expect(error.cause).toBeInstanceOf(SyntaxError);
  });

  it("reports schema violations as ValidationError", async () => {
    const filePath = await fixture(
      "invalid.json",
      JSON.stringify({ restaurants: [{ name: "Grill", status: "busy", sortingValues }] }),
    );
    const error = await loadFailure(new RestaurantFileSource(filePath));

    expect(error.reason).toBe("ValidationError");
    expect(error.message).toBe(
      "Restaurant data file failed validation: " +
        "restaurants.0.status: Invalid enum value. Expected 'open' | 'order ahead' | 'closed', received 'busy'",
    );
  });

  it("wraps any other read failure as Unknown", async () => {
    const diskError = new Error("disk unplugged");
    const source = new RestaurantFileSource("list.json", () => Promise.reject(diskError));
    const error = await loadFailure(source);

    expect(error.reason).toBe("Unknown");
    expect(error.message).toBe("Failed to read restaurant data: disk unplugged");
    expect(error.cause).toBe(diskError);
  });

  it("re-reads the file on every load", async () => {
    let reads = 0;
    const source = new RestaurantFileSource("list.json", async () => {
      reads++;
      return JSON.stringify({ restaurants: [] });
    });

    await source.loadRestaurants();
    await source.loadRestaurants();

    expect(reads).toBe(2);
  });
});
