import fs from "fs-extra";
import { mkdtemp } from "fs/promises";
import os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  baseUrlFor,
  DEFAULT_SCOPE,
  loadConfig,
  normalizeRegion,
  readClientSecret,
} from "../src/config";
import { ValidationError } from "../src/errors";

describe("config", () => {
  let tmpDir: string;
  let secretPath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "ninja-config-"));
    secretPath = path.join(tmpDir, "client-secret");
    await fs.outputFile(secretPath, "test-secret\n");
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(tmpDir);
  });

  describe("loadConfig", () => {
    it("should read settings from the environment and the secret file", async () => {
      const config = await loadConfig(
        {},
        { NINJA_CLIENT_ID: "test-client", NINJA_CLIENT_SECRET_PATH: secretPath }
      );

      expect(config).toEqual({
        clientId: "test-client",
        clientSecret: "test-secret",
        region: "app",
        host: "ninjarmm.com",
        scope: DEFAULT_SCOPE,
        filter: undefined,
        outputPath: undefined,
      });
    });

    it("should let command-line values override the environment", async () => {
      const config = await loadConfig(
        {
          clientId: "cli-client",
          secretPath,
          region: "EU",
          scope: "monitoring",
          filter: "org = 12",
          outputPath: "out/devices.csv",
        },
        { NINJA_CLIENT_ID: "env-client", NINJA_REGION: "ca" }
      );

      expect(config.clientId).toBe("cli-client");
      expect(config.region).toBe("eu");
      expect(config.scope).toBe("monitoring");
      expect(config.filter).toBe("org = 12");
      expect(config.outputPath).toBe("out/devices.csv");
    });

    it("should fail validation without a client id", async () => {
      await expect(loadConfig({ secretPath }, {})).rejects.toBeInstanceOf(ValidationError);
    });

    it("should fail validation without any secret", async () => {
      await expect(loadConfig({}, { NINJA_CLIENT_ID: "test-client" })).rejects.toThrow(
        "Missing client secret: pass --secret-path or set NINJA_CLIENT_SECRET_PATH"
      );
    });
  });

  describe("readClientSecret", () => {
    it("should accept a raw secret from the environment with a warning", async () => {
      const secret = await readClientSecret(undefined, { NINJA_CLIENT_SECRET: " test-secret " });

      expect(secret).toBe("test-secret");
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it("should reject a missing secret file", async () => {
      const missing = path.join(tmpDir, "nope");

      await expect(readClientSecret(missing, {})).rejects.toThrow(
        `Client secret file not found: ${missing}`
      );
    });

    it("should reject an empty secret file", async () => {
      const empty = path.join(tmpDir, "empty");
      await fs.outputFile(empty, "  \n");

      await expect(readClientSecret(empty, {})).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("regions", () => {
    it("should map us to the app instance", () => {
      expect(normalizeRegion("us")).toBe("app");
      expect(normalizeRegion("US")).toBe("app");
      expect(normalizeRegion("oc")).toBe("oc");
    });

    it("should reject values that are not a sub-domain", () => {
      expect(() => normalizeRegion("eu.evil.com/")).toThrow(ValidationError);
    });

    it("should build the base URL", () => {
      expect(baseUrlFor({ region: "us2", host: "ninjarmm.com" })).toBe("https://us2.ninjarmm.com");
    });
  });
});
