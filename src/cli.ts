#!/usr/bin/env node

import { Command } from "commander";
import { registerCacheCommand } from "./commands/cache";
import { registerClassifyCommand } from "./commands/classify";
import { registerCreateCommand } from "./commands/create";
import { registerEnrichCommand } from "./commands/enrich";
import { registerGenresCommand } from "./commands/genres";
import { registerSyncCommand } from "./commands/sync";

const program = new Command();

program
  .name("moodsort")
  .description("Sort your Spotify liked songs into mood playlists")
  .version("0.1.0");

registerSyncCommand(program);
registerEnrichCommand(program);
registerClassifyCommand(program);
registerCreateCommand(program);
registerGenresCommand(program);
registerCacheCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
