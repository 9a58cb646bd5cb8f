/**
 * list-restaurants.ts - Restaurant List in the Terminal
 *
 * Purpose: Drives the restaurant list controller against the local data file
 * and prints the rows a list screen would draw.
 *
 * Usage:
 *   npx tsx scripts/list-restaurants.ts
 *   npx tsx scripts/list-restaurants.ts --sort distance --search sushi
 *   RESTAURANT_DATA_FILE=./other.json npx tsx scripts/list-restaurants.ts
 */

import "dotenv/config";
import { runListCommand } from "../server/listCommand";

runListCommand(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
