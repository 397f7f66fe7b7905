import dotenv from "dotenv";
import fs from "fs";
import path from "path";
import yaml from "yaml";
import { isRecord } from "./json";
import {
  defaultConfigPath,
  defaultDatabasePath,
  defaultDataDir,
  expandHome,
} from "./paths";

export type MoodsortConfig = {
  spotify: {
    client_id: string | null;
    client_secret: string | null;
    access_token: string | null;
    refresh_token: string | null;
  };
  reccobeats: {
    base_url: string;
    rate_limit_ms: number;
  };
  data: {
    dir: string;
  };
  database: {
    path: string;
  };
};

type PartialConfig = {
  spotify?: Partial<MoodsortConfig["spotify"]>;
  reccobeats?: Partial<MoodsortConfig["reccobeats"]>;
  data?: Partial<MoodsortConfig["data"]>;
  database?: Partial<MoodsortConfig["database"]>;
};

export const DEFAULT_CONFIG: MoodsortConfig = {
  spotify: {
    client_id: null,
    client_secret: null,
    access_token: null,
    refresh_token: null,
  },
  reccobeats: {
    base_url: "https://api.reccobeats.com",
    rate_limit_ms: 500,
  },
  data: {
    dir: defaultDataDir(),
  },
  database: {
    path: defaultDatabasePath(),
  },
};

function pickString(section: unknown, key: string): string | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

function pickNumber(section: unknown, key: string): number | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function envValue(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

export function parseConfigFile(raw: string): PartialConfig {
  const parsed: unknown = yaml.parse(raw);
  if (!isRecord(parsed)) {
    return {};
  }

  const { spotify, reccobeats, data, database } = parsed;
  const fileConfig: PartialConfig = {};

  const clientId = pickString(spotify, "client_id");
  const clientSecret = pickString(spotify, "client_secret");
  const accessToken = pickString(spotify, "access_token");
  const refreshToken = pickString(spotify, "refresh_token");
  fileConfig.spotify = {
    ...(clientId !== undefined ? { client_id: clientId } : {}),
    ...(clientSecret !== undefined ? { client_secret: clientSecret } : {}),
    ...(accessToken !== undefined ? { access_token: accessToken } : {}),
    ...(refreshToken !== undefined ? { refresh_token: refreshToken } : {}),
  };

  const baseUrl = pickString(reccobeats, "base_url");
  const rateLimitMs = pickNumber(reccobeats, "rate_limit_ms");
  fileConfig.reccobeats = {
    ...(baseUrl !== undefined ? { base_url: baseUrl } : {}),
    ...(rateLimitMs !== undefined ? { rate_limit_ms: rateLimitMs } : {}),
  };

  const dataDir = pickString(data, "dir");
  fileConfig.data = dataDir !== undefined ? { dir: dataDir } : {};

  const dbPath = pickString(database, "path");
  fileConfig.database = dbPath !== undefined ? { path: dbPath } : {};

  return fileConfig;
}

/**
 * Defaults, then the YAML file, then environment variables.
 * A .env file in the working directory is loaded before anything is read.
 */
export function loadConfig(): MoodsortConfig {
  dotenv.config();

  const configPath = expandHome(
    process.env.MOODSORT_CONFIG_PATH ?? defaultConfigPath()
  );

  let fileConfig: PartialConfig = {};
  if (fs.existsSync(configPath)) {
    fileConfig = parseConfigFile(fs.readFileSync(configPath, "utf8"));
  }

  const merged: MoodsortConfig = {
    spotify: {
      client_id: fileConfig.spotify?.client_id ?? DEFAULT_CONFIG.spotify.client_id,
      client_secret:
        fileConfig.spotify?.client_secret ?? DEFAULT_CONFIG.spotify.client_secret,
      access_token:
        fileConfig.spotify?.access_token ?? DEFAULT_CONFIG.spotify.access_token,
      refresh_token:
        fileConfig.spotify?.refresh_token ?? DEFAULT_CONFIG.spotify.refresh_token,
    },
    reccobeats: {
      base_url:
        fileConfig.reccobeats?.base_url ?? DEFAULT_CONFIG.reccobeats.base_url,
      rate_limit_ms:
        fileConfig.reccobeats?.rate_limit_ms ?? DEFAULT_CONFIG.reccobeats.rate_limit_ms,
    },
    data: {
      dir: fileConfig.data?.dir ?? DEFAULT_CONFIG.data.dir,
    },
    database: {
      path: fileConfig.database?.path ?? DEFAULT_CONFIG.database.path,
    },
  };

  const dataDir = envValue("MOODSORT_DATA_DIR") ?? merged.data.dir;
  const dbPath = envValue("MOODSORT_DB_PATH") ?? merged.database.path;

  return {
    spotify: {
      client_id: envValue("SPOTIFY_CLIENT_ID") ?? merged.spotify.client_id,
      client_secret: envValue("SPOTIFY_CLIENT_SECRET") ?? merged.spotify.client_secret,
      access_token: envValue("SPOTIFY_ACCESS_TOKEN") ?? merged.spotify.access_token,
      refresh_token: envValue("SPOTIFY_REFRESH_TOKEN") ?? merged.spotify.refresh_token,
    },
    reccobeats: {
      base_url: envValue("MOODSORT_RECCOBEATS_URL") ?? merged.reccobeats.base_url,
      rate_limit_ms: merged.reccobeats.rate_limit_ms,
    },
    data: { dir: path.resolve(expandHome(dataDir)) },
    database: {
      path: dbPath === ":memory:" ? dbPath : expandHome(dbPath),
    },
  };
}
