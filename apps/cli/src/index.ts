#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import {
  createLogger,
  DataCollector,
  RANKING_MODES,
  RedditApiClient,
  TIME_WINDOWS,
  toCombinedTable,
  updateDataset,
  type Logger,
} from "@sampler/collector";
import { CsvTableStore } from "@sampler/store";
import {
  COMMENT_COLUMNS,
  POST_COLUMNS,
  type ResolutionBound,
  type Table,
  type TableStore,
} from "@sampler/types";
import { loadConfig, requireRedditCredentials } from "./config.js";
import { ProgressLine } from "./progress.js";
import { columnTypesFor, withStores, type DatasetKind } from "./stores.js";

const intArg = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got: ${value}`);
  }
  return parsed;
};

const boundArg = (value: string): ResolutionBound => {
  if (value.toLowerCase() === "unbounded") {
    return "unbounded";
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer or "unbounded", got: ${value}`);
  }
  return parsed;
};

const kindArg = (value: string): DatasetKind => {
  if (value !== "posts" && value !== "comments") {
    throw new InvalidArgumentError(`Expected posts or comments, got: ${value}`);
  }
  return value;
};

async function writeTable(
  store: TableStore,
  location: string,
  table: Table,
  update: boolean,
  logger: Logger,
): Promise<number> {
  if (update) {
    const combined = await updateDataset(store, location, table, { logger });
    return combined.rows.length;
  }
  await store.save(location, table);
  logger.info({ location, rows: table.rows.length }, "dataset_saved");
  return table.rows.length;
}

const program = new Command();
program.name("sampler").description("Collect subreddit posts and comments into tabular datasets");

program
  .command("collect")
  .description("Collect posts, and optionally comments, from one or more subreddits")
  .argument("<subreddits...>", "Subreddit names, with or without r/")
  .option("--mode <mode>", `Ranking mode: ${RANKING_MODES.join(", ")}`, "new")
  .option("--limit <number>", "Posts per subreddit for new and hot", intArg)
  .option("--time-window <window>", `Time window for top: ${TIME_WINDOWS.join(", ")}`)
  .option("--no-comments", "Skip comment collection")
  .option("--replies", "Include replies, not just top-level comments", false)
  .option(
    "--resolve-more <bound>",
    "Placeholder expansions per post, or \"unbounded\"",
    boundArg,
    0,
  )
  .option("--posts-out <location>", "Posts dataset file or name", "posts.csv")
  .option("--comments-out <location>", "Comments dataset file or name", "comments.csv")
  .option("--update", "Merge into the existing datasets instead of replacing them", false)
  .action(
    async (
      subreddits: string[],
      options: {
        mode: string;
        limit?: number;
        timeWindow?: string;
        comments: boolean;
        replies: boolean;
        resolveMore: ResolutionBound;
        postsOut: string;
        commentsOut: string;
        update: boolean;
      },
    ) => {
      const config = loadConfig();
      const logger = createLogger({ level: config.LOG_LEVEL, pretty: true });
      const credentials = requireRedditCredentials(config);
      const client = new RedditApiClient({
        ...credentials,
        userAgent: config.REDDIT_USER_AGENT,
        requestDelayMs: config.SCRAPE_RATE_LIMIT_MS,
        maxRetryAttempts: config.SCRAPE_MAX_RETRY_ATTEMPTS,
        retryBaseDelayMs: config.SCRAPE_RETRY_BASE_DELAY_MS,
        logger,
      });
      const collector = new DataCollector(client, { logger, progress: new ProgressLine() });

      const result = await collector.collect({
        subreddits,
        mode: options.mode,
        limit: options.limit ?? null,
        timeWindow: options.timeWindow ?? null,
        includeComments: options.comments,
        includeReplies: options.replies,
        resolutionBound: options.resolveMore,
      });

      await withStores(config, async (stores) => {
        const postRows = await writeTable(
          stores.posts,
          options.postsOut,
          toCombinedTable(POST_COLUMNS, result.posts),
          options.update,
          logger,
        );
        const commentRows = result.comments
          ? await writeTable(
              stores.comments,
              options.commentsOut,
              toCombinedTable(COMMENT_COLUMNS, result.comments),
              options.update,
              logger,
            )
          : null;

        const summary = {
          subreddits: [...result.posts.keys()],
          posts: { location: options.postsOut, rows: postRows },
          comments: commentRows === null ? null : { location: options.commentsOut, rows: commentRows },
        };
        console.log(JSON.stringify(summary, null, 2));
      });
    },
  );

program
  .command("merge")
  .description("Merge an incoming CSV dataset into an existing dataset")
  .argument("<destination>", "Existing dataset file or name")
  .argument("<incoming>", "CSV file with the new rows")
  .option("--kind <kind>", "Dataset kind: posts or comments", kindArg, "posts")
  .option("--key <column>", "Column identifying a row", "id")
  .option("--sort <column>", "Column to order the result by", "subreddit_name")
  .option("--dry-run", "Report the merge without writing it", false)
  .action(
    async (
      destination: string,
      incomingPath: string,
      options: { kind: DatasetKind; key: string; sort: string; dryRun: boolean },
    ) => {
      const config = loadConfig();
      const logger = createLogger({ level: config.LOG_LEVEL, pretty: true });
      const incoming = await new CsvTableStore({
        columnTypes: columnTypesFor(options.kind),
      }).load(incomingPath);
      if (!incoming) {
        throw new Error(`Incoming dataset not found: ${incomingPath}`);
      }

      await withStores(config, async (stores) => {
        const store = options.kind === "posts" ? stores.posts : stores.comments;
        const combined = await updateDataset(store, destination, incoming, {
          key: options.key,
          sort: options.sort,
          persist: !options.dryRun,
          logger,
        });
        console.log(
          JSON.stringify(
            {
              destination,
              incomingRows: incoming.rows.length,
              combinedRows: combined.rows.length,
              persisted: !options.dryRun,
            },
            null,
            2,
          ),
        );
      });
    },
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error("cli_error", error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
