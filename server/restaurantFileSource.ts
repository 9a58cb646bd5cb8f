import { readFile } from "fs/promises";
import { ZodError } from "zod";
import { formatSchemaIssues, parseRestaurantList } from "@shared/schema";
import type { Restaurant } from "@shared/types";
import type { RestaurantDataSource } from "@shared/domain/restaurantList";
import { log, logError } from "./utils/logger";

export type LoadReasonCategory = "NotFound" | "JSONParseError" | "ValidationError" | "Unknown";

export class RestaurantLoadError extends Error {
  constructor(
    message: string,
    readonly reason: LoadReasonCategory,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RestaurantLoadError";
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

type ReadText = (filePath: string) => Promise<string>;

const readUtf8: ReadText = (filePath) => readFile(filePath, "utf-8");

/**
 * Data source backed by a restaurant list JSON document on disk.
 * Every call re-reads the file.
 */
export class RestaurantFileSource implements RestaurantDataSource {
  constructor(
    private readonly filePath: string,
    private readonly readText: ReadText = readUtf8,
  ) {}

  async loadRestaurants(): Promise<Restaurant[]> {
    try {
      const restaurants = parseRestaurantList(JSON.parse(await this.readText(this.filePath)));
      log("[restaurants] loaded", { file: this.filePath, count: restaurants.length });
      return restaurants;
    } catch (error) {
      const failure = this.toLoadError(error);
      logError("[restaurants] load failed", error, { file: this.filePath, reason: failure.reason });
      throw failure;
    }
  }

  private toLoadError(error: unknown): RestaurantLoadError {
    if (isNodeError(error) && error.code === "ENOENT") {
      return new RestaurantLoadError(`Restaurant data file not found: ${this.filePath}`, "NotFound", this.filePath, { cause: error });
    }
    if (error instanceof SyntaxError) {
      return new RestaurantLoadError(`Restaurant data file is not valid JSON: ${error.message}`, "JSONParseError", this.filePath, { cause: error });
    }
    if (error instanceof ZodError) {
      return new RestaurantLoadError(
        `Restaurant data file failed validation: ${formatSchemaIssues(error).join("; ")}`,
        "ValidationError",
        this.filePath,
        { cause: error },
      );
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new RestaurantLoadError(`Failed to read restaurant data: ${detail}`, "Unknown", this.filePath, { cause: error });
  }
}
