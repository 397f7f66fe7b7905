import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG, loadConfig, parseConfigFile } from "../config";

describe("parseConfigFile", () => {
  it("reads the known sections", () => {
    const parsed = parseConfigFile(`
spotify:
  client_id: test-client
  client_secret: test-secret
reccobeats:
  base_url: http://localhost:9000
  rate_limit_ms: 0
data:
  dir: ./library
database:
  path: ":memory:"
`);

    expect(parsed).toEqual({
      spotify: { client_id: "test-client", client_secret: "test-secret" },
      reccobeats: { base_url: "http://localhost:9000", rate_limit_ms: 0 },
      data: { dir: "./library" },
      database: { path: ":memory:" },
    });
  });

  it("ignores values of the wrong type", () => {
    const parsed = parseConfigFile(`
spotify:
  client_id: ""
reccobeats:
  rate_limit_ms: fast
`);
    expect(parsed.spotify).toEqual({});
    expect(parsed.reccobeats).toEqual({});
  });

  it("returns nothing for an empty file", () => {
    expect(parseConfigFile("")).toEqual({});
  });
});

describe("loadConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to defaults without a config file", () => {
    const config = loadConfig();
    expect(config.reccobeats).toEqual(DEFAULT_CONFIG.reccobeats);
  });

  it("lets environment variables override", () => {
    vi.stubEnv("SPOTIFY_ACCESS_TOKEN", "test-token");
    vi.stubEnv("MOODSORT_DATA_DIR", "relative-data");
    vi.stubEnv("MOODSORT_DB_PATH", ":memory:");
    vi.stubEnv("MOODSORT_RECCOBEATS_URL", "http://localhost:9000");

    const config = loadConfig();

    expect(config.spotify.access_token).toBe("test-token");
    expect(config.data.dir).toBe(path.resolve("relative-data"));
    expect(config.database.path).toBe(":memory:");
    expect(config.reccobeats.base_url).toBe("http://localhost:9000");
  });
});
