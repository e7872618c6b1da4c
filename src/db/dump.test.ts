import { describe, it, expect } from "vitest";
import { pgDumpArgs } from "./dump";

describe("pgDumpArgs", () => {
  it("builds a compressed custom-format dump command", () => {
    expect(
      pgDumpArgs(
        { host: "localhost", port: 5432, user: "anon", password: "test-secret", database: "shop" },
        "shop.dump"
      )
    ).toEqual(["-Fc", "-Z", "9", "-h", "localhost", "-p", "5432", "-U", "anon", "-f", "shop.dump", "shop"]);
  });
});
