import { ConfigError, loadConfig, type AppConfig } from "./config";
import { RestaurantFileSource } from "./restaurantFileSource";
import { log, logError, logWarn, setLogLevel } from "./utils/logger";
import { RestaurantListController } from "@shared/domain/restaurantList";
import { createSortingCatalog } from "@shared/domain/restaurantSorting";
import { SORT_KEYS, SORT_KEY_IDS, findSortKey } from "@shared/sortKeys";

export const USAGE = [
  "Usage: list-restaurants [--sort <key>] [--search <term>] [--file <path>]",
  `  --sort    one of: ${SORT_KEY_IDS.join(", ")}`,
  "  --search  case-insensitive part of the restaurant name",
  "  --file    restaurant list JSON (default: RESTAURANT_DATA_FILE)",
].join("\n");

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ListOptions {
  sort?: string;
  search?: string;
  file?: string;
  help: boolean;
}

const VALUE_FLAGS = {
  "--sort": "sort",
  "--search": "search",
  "--file": "file",
} as const;

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

export function parseListArgs(argv: string[]): ListOptions {
  const options: ListOptions = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }

    if (!isValueFlag(arg)) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    if (i + 1 >= argv.length) {
      throw new UsageError(`Missing value for ${arg}`);
    }
    options[VALUE_FLAGS[arg]] = argv[i + 1];
    i++;
  }

  return options;
}

/** Title line, then every row as its title followed by the indented subtitle lines. */
export function formatRows(controller: RestaurantListController): string[] {
  const term = controller.activeSearchTerm.trim();
  const heading = term
    ? `${controller.screenTitle} (${controller.activeSortKey.label}, search "${term}")`
    : `${controller.screenTitle} (${controller.activeSortKey.label})`;

  const lines = [heading];
  if (controller.rowCount() === 0) {
    lines.push("  No restaurants to show.");
    return lines;
  }

  for (let index = 0; index < controller.rowCount(); index++) {
    const row = controller.row(index);
    if (!row) continue;
    lines.push(`${index + 1}. ${row.title}`);
    for (const line of row.subtitle.split("\n")) {
      lines.push(`   ${line}`);
    }
  }
  return lines;
}

export interface ListCommandIO {
  print: (line: string) => void;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load the configured restaurant file, apply --sort/--search and print the rows.
 * Resolves with the process exit code.
 */
export async function runListCommand(
  argv: string[],
  io: ListCommandIO = { print: (line) => console.log(line) },
): Promise<number> {
  let options: ListOptions;
  try {
    options = parseListArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.print(error.message);
      io.print(USAGE);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    io.print(USAGE);
    return 0;
  }

  let config: AppConfig;
  try {
    config = loadConfig(io.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logError("[config] invalid environment", error, { details: error.details });
      return 1;
    }
    throw error;
  }
  setLogLevel(config.logLevel);

  const filePath = options.file ?? config.restaurantDataFile;
  const controller = new RestaurantListController(
    new RestaurantFileSource(filePath),
    createSortingCatalog({ statusFirst: config.sortOpenFirst }),
    SORT_KEYS[config.defaultSortKey],
  );

  let loadFailed = false;
  controller.errorSink = {
    onLoadError: (error) => {
      loadFailed = true;
      logError("[list] could not load restaurants", error, { file: filePath });
    },
  };

  await controller.initialize();
  if (loadFailed) return 1;

  if (options.sort !== undefined) {
    if (!findSortKey(options.sort)) {
      logWarn("[list] ignoring unknown sort key", { sort: options.sort });
    }
    controller.selectSort(options.sort);
  }
  if (options.search !== undefined) {
    controller.setSearchTerm(options.search);
  }

  log("[list] rendering", {
    sort: controller.activeSortKey.id,
    search: controller.activeSearchTerm,
    rows: controller.rowCount(),
  });

  for (const line of formatRows(controller)) {
    io.print(line);
  }
  return 0;
}
