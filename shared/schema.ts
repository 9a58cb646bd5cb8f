import { z } from "zod";
import type { Restaurant } from "./types";

const metric = z.number().finite();

export const restaurantStatusSchema = z.enum(["open", "order ahead", "closed"]);

export const sortingValuesSchema = z.object({
  bestMatch: metric,
  newest: metric,
  ratingAverage: metric,
  distance: metric,
  popularity: metric,
  averageProductPrice: metric,
  deliveryCosts: metric,
  minCost: metric,
});

export const restaurantSchema = z.object({
  name: z.string().min(1, "Restaurant name must not be empty"),
  status: restaurantStatusSchema,
  sortingValues: sortingValuesSchema,
});

/** Shape of data/restaurants.json */
export const restaurantListDocumentSchema = z.object({
  restaurants: z.array(restaurantSchema),
});

/**
 * Validate an already-parsed JSON value and return its restaurants.
 * Throws the ZodError untouched so callers can report every issue.
 */
export function parseRestaurantList(input: unknown): Restaurant[] {
  return restaurantListDocumentSchema.parse(input).restaurants;
}

export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`);
}
