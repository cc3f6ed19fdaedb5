import { CONFIG_DEFAULTS, loadConfig } from "../config";

describe("loadConfig", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("uses file storage and defaults with an empty environment", () => {
    expect(loadConfig({})).toEqual({
      storageMode: "file",
      databaseUrl: null,
      dataDir: "user_data",
      modelWeightsPath: "models/bodyfat_model.json",
      geminiApiKey: "",
      geminiModel: "gemini-1.5-flash",
      chatTimeoutMs: 30000,
    });
  });

  test("switches to postgres when DATABASE_URL is set", () => {
    const config = loadConfig({ DATABASE_URL: "postgres://localhost/fitness" });
    expect(config.storageMode).toBe("postgres");
    expect(config.databaseUrl).toBe("postgres://localhost/fitness");
  });

  test("lets STORAGE_MODE force file storage", () => {
    const config = loadConfig({ DATABASE_URL: "postgres://localhost/fitness", STORAGE_MODE: "FILE" });
    expect(config.storageMode).toBe("file");
  });

  test("requires a database URL for postgres mode", () => {
    expect(() => loadConfig({ STORAGE_MODE: "postgres" })).toThrow("STORAGE_MODE=postgres requires DATABASE_URL");
  });

  test("logs and ignores an unknown storage mode", () => {
    expect(loadConfig({ STORAGE_MODE: "redis" }).storageMode).toBe("file");
    expect(console.error).toHaveBeenCalledWith('[config] unknown STORAGE_MODE "redis", falling back');
  });

  test("reads overrides and trims them", () => {
    const config = loadConfig({
      USER_DATA_DIR: " /tmp/users ",
      BODYFAT_MODEL_PATH: "weights.json",
      GEMINI_API_KEY: "test-secret",
      GEMINI_MODEL: "gemini-test",
      CHAT_TIMEOUT_MS: "5000",
    });
    expect(config.dataDir).toBe("/tmp/users");
    expect(config.modelWeightsPath).toBe("weights.json");
    expect(config.geminiApiKey).toBe("test-secret");
    expect(config.geminiModel).toBe("gemini-test");
    expect(config.chatTimeoutMs).toBe(5000);
  });

  test("falls back to the default timeout for invalid numbers", () => {
    for (const raw of ["abc", "-5", "0", "1.5"]) {
      expect(loadConfig({ CHAT_TIMEOUT_MS: raw }).chatTimeoutMs).toBe(CONFIG_DEFAULTS.chatTimeoutMs);
    }
  });
});
