import { Command } from "commander";
import { describe, expect, it } from "vitest";
import { addConnectionOptions, type ConnectionOptions } from "../src/ninjaSession";

describe("addConnectionOptions", () => {
  it("should parse the shared connection flags", () => {
    const program = addConnectionOptions(new Command().exitOverride());

    program.parse(
      ["--client-id", "test-client", "--secret-path", "secrets/ninja", "--region", "eu", "--scope", "monitoring"],
      { from: "user" }
    );

    expect(program.opts<ConnectionOptions>()).toEqual({
      clientId: "test-client",
      secretPath: "secrets/ninja",
      region: "eu",
      scope: "monitoring",
    });
  });

  it("should leave unset flags undefined so the environment applies", () => {
    const program = addConnectionOptions(new Command().exitOverride());

    program.parse([], { from: "user" });

    expect(program.opts<ConnectionOptions>()).toEqual({});
  });
});
