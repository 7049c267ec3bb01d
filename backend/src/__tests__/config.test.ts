jest.mock("../utils/logger", () => {
    const scoped = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    };
    scoped.child.mockReturnValue(scoped);
    return { logger: scoped };
});

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import {
    defaultConfig,
    loadConfig,
    parseConfig,
    resolveConfigPath,
    saveConfig,
} from "../config";
import { AppError, ErrorCode } from "../utils/errors";

describe("config", () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "nowscrobble-config-"));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe("resolveConfigPath", () => {
        it("prefers NOWSCROBBLE_CONFIG_PATH", () => {
            expect(
                resolveConfigPath({ NOWSCROBBLE_CONFIG_PATH: "/etc/ns.json" })
            ).toBe("/etc/ns.json");
        });

        it("falls back to the user config directory", () => {
            expect(resolveConfigPath({})).toBe(
                path.join(os.homedir(), ".config", "nowscrobble", "config.json")
            );
        });
    });

    describe("defaultConfig", () => {
        it("fills every section with defaults", () => {
            const config = defaultConfig();

            expect(config.refreshInterval).toBe(5);
            expect(config.scrobbleThreshold).toBe(50);
            expect(config.cleanup.enabled).toBe(true);
            expect(config.cleanup.patterns).toContain("\\s*\\[Explicit\\]");
            expect(config.appFiltering).toEqual({
                promptForNewApps: true,
                scrobbleUnknown: true,
                allowedApps: [],
                ignoredApps: [],
            });
            expect(config.source).toEqual({
                command: "media-control",
                args: ["get"],
                timeoutMs: 5000,
            });
            expect(config.lastfm).toEqual({
                enabled: false,
                apiKey: "",
                apiSecret: "",
                sessionKey: "",
            });
            expect(config.listenbrainz).toEqual([
                {
                    enabled: false,
                    name: "Primary",
                    token: "",
                    apiUrl: "https://api.listenbrainz.org",
                },
            ]);
        });
    });

    describe("parseConfig", () => {
        it("reports schema violations with their paths", () => {
            expect(() => parseConfig({ refreshInterval: "fast" }, {})).toThrow(
                /^Invalid configuration: refreshInterval: /
            );
        });

        it("applies env overrides before validating", () => {
            const config = parseConfig(
                { scrobbleThreshold: 50 },
                {
                    NOWSCROBBLE_REFRESH_INTERVAL: "10",
                    NOWSCROBBLE_SCROBBLE_THRESHOLD: "80",
                }
            );

            expect(config.refreshInterval).toBe(10);
            expect(config.scrobbleThreshold).toBe(80);
        });

        it("validates env overrides", () => {
            const parse = () => parseConfig({}, { NOWSCROBBLE_REFRESH_INTERVAL: "-5" });

            expect(parse).toThrow(AppError);
            expect(parse).toThrow("refreshInterval must be greater than 0");
        });

        it("rejects overlapping app filter lists", () => {
            expect(() =>
                parseConfig(
                    {
                        appFiltering: {
                            allowedApps: ["com.example.player"],
                            ignoredApps: ["com.example.player"],
                        },
                    },
                    {}
                )
            ).toThrow(
                "App 'com.example.player' appears in both allowedApps and ignoredApps"
            );
        });
    });

    describe("loadConfig / saveConfig", () => {
        it("creates a default file when none exists", async () => {
            const configPath = path.join(tempDir, "nested", "config.json");

            const config = await loadConfig(configPath, {});

            expect(config).toEqual(defaultConfig());
            const written = JSON.parse(await fs.readFile(configPath, "utf8"));
            expect(written.refreshInterval).toBe(5);
            expect(written.listenbrainz[0].name).toBe("Primary");
        });

        it("round-trips a saved config", async () => {
            const configPath = path.join(tempDir, "config.json");
            const config = defaultConfig();
            config.scrobbleThreshold = 75;
            config.appFiltering.allowedApps = ["com.example.player"];

            await saveConfig(config, configPath);
            const loaded = await loadConfig(configPath, {});

            expect(loaded.scrobbleThreshold).toBe(75);
            expect(loaded.appFiltering.allowedApps).toEqual(["com.example.player"]);
        });

        it("rejects files that are not JSON", async () => {
            const configPath = path.join(tempDir, "config.json");
            await fs.writeFile(configPath, "refresh_interval = 5\n", "utf8");

            await expect(loadConfig(configPath, {})).rejects.toMatchObject({
                code: ErrorCode.INVALID_CONFIG,
                message: `Failed to parse config file ${configPath}`,
            });
        });

        it("fails at load time when the config is invalid", async () => {
            const configPath = path.join(tempDir, "config.json");
            await fs.writeFile(
                configPath,
                JSON.stringify({ scrobbleThreshold: 0 }),
                "utf8"
            );

            await expect(loadConfig(configPath, {})).rejects.toBeInstanceOf(AppError);
        });
    });
});
