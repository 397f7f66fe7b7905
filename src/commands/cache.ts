import { Command } from "commander";
import type Database from "better-sqlite3";
import { loadConfig } from "../lib/config";
import { openDatabase } from "../db";
import { createEnrichmentCache, type CacheTableStats, type EnrichmentCache } from "../enrichment";

function withCache<T>(fn: (cache: EnrichmentCache) => T): T {
  const config = loadConfig();
  const db: Database.Database = openDatabase(config.database.path);
  try {
    return fn(createEnrichmentCache(db));
  } finally {
    db.close();
  }
}

export function formatTableStats(label: string, stats: CacheTableStats): string {
  const hitRate =
    stats.total > 0 ? `${((stats.found / stats.total) * 100).toFixed(0)}%` : "n/a";
  return `${label.padEnd(16)} ${stats.total} cached, ${stats.found} found, ${stats.notFound} not found (${hitRate})`;
}

type StatsOptions = {
  format?: string;
};

function runStats(options: StatsOptions): void {
  const stats = withCache((cache) => cache.stats());
  if (options.format === "json") {
    console.log(JSON.stringify(stats, null, 2));
    return;
  }
  console.log(formatTableStats("Artist genres:", stats.artists));
  console.log(formatTableStats("Audio features:", stats.features));
}

function runClear(): void {
  const cleared = withCache((cache) => cache.clear());
  console.log(
    `Cleared ${cleared.artists} cached artists and ${cleared.features} cached tracks.`
  );
}

export function registerCacheCommand(program: Command): void {
  const cacheCmd = program
    .command("cache")
    .description("Inspect and manage the enrichment cache");

  cacheCmd
    .command("stats")
    .description("Show cache statistics")
    .option("--format <format>", "Output format (text|json)", "text")
    .action((options: StatsOptions) => runStats(options));

  cacheCmd
    .command("clear")
    .description("Clear all cached enrichment data")
    .action(() => runClear());
}
