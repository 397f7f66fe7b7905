import os from "os";
import path from "path";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function defaultConfigPath(): string {
  return path.join(os.homedir(), ".config", "moodsort", "config.yaml");
}

export function defaultDatabasePath(): string {
  return path.join(os.homedir(), ".local", "share", "moodsort", "moodsort.db");
}

export function defaultDataDir(): string {
  return path.resolve("data");
}

export function likedSongsPath(dataDir: string): string {
  return path.join(dataDir, "raw", "liked_songs.json");
}

export function enrichedTracksPath(dataDir: string): string {
  return path.join(dataDir, "processed", "tracks.json");
}
