/**
 * Tests for Extensions (the global allow-list) and per-account Deps.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Deps } from "../src/deps.js";
import { ACCOUNT_PROTOCOL, AdminCap, Extensions } from "../src/extensions.js";
import { Metadata } from "../src/metadata.js";
import { versionWitness } from "../src/witness.js";
import { codeOf } from "./helpers.js";

// =============================================================================
// Extensions
// =============================================================================

describe("Extensions", () => {
  let extensions: Extensions;
  let cap: AdminCap;

  beforeEach(() => {
    ({ extensions, cap } = Extensions.init());
    extensions.add(cap, ACCOUNT_PROTOCOL, "0xac01", 1);
  });

  it("registers extensions with their first version", () => {
    extensions.add(cap, "Treasury", "0x10", 1);
    expect(extensions.length).toBe(2);
    expect(extensions.getLatestForName("Treasury")).toEqual({ addr: "0x10", version: 1 });
    expect(extensions.isExtension("Treasury", "0x10", 1)).toBe(true);
    expect(extensions.isExtension("Treasury", "0x10", 2)).toBe(false);
  });

  it("rejects a second registration of a name or address", () => {
    extensions.add(cap, "Treasury", "0x10", 1);
    expect(codeOf(() => extensions.add(cap, "Treasury", "0x11", 1))).toBe(
      "EXTENSION_ALREADY_EXISTS",
    );
    expect(codeOf(() => extensions.add(cap, "Other", "0x10", 1))).toBe(
      "EXTENSION_ALREADY_EXISTS",
    );
  });

  it("appends strictly increasing versions at new addresses", () => {
    extensions.add(cap, "Treasury", "0x10", 1);
    extensions.update(cap, "Treasury", "0x12", 2);

    expect(extensions.getLatestForName("Treasury")).toEqual({ addr: "0x12", version: 2 });
    expect(extensions.isExtension("Treasury", "0x10", 1)).toBe(true);
    expect(extensions.list().find((e) => e.name === "Treasury")?.history).toHaveLength(2);

    expect(codeOf(() => extensions.update(cap, "Treasury", "0x13", 2))).toBe(
      "VERSION_NOT_INCREASING",
    );
    expect(codeOf(() => extensions.update(cap, "Treasury", "0x10", 3))).toBe(
      "EXTENSION_ALREADY_EXISTS",
    );
  });

  it("removes extensions except the protocol itself", () => {
    extensions.add(cap, "Treasury", "0x10", 1);
    extensions.remove(cap, "Treasury");
    expect(codeOf(() => extensions.getLatestForName("Treasury"))).toBe("EXTENSION_NOT_FOUND");
    expect(codeOf(() => extensions.remove(cap, ACCOUNT_PROTOCOL))).toBe(
      "CANNOT_REMOVE_ACCOUNT_PROTOCOL",
    );
    expect(codeOf(() => extensions.remove(cap, "Missing"))).toBe("EXTENSION_NOT_FOUND");
  });

  it("only accepts its own admin cap", () => {
    const other = Extensions.init().cap;
    expect(codeOf(() => extensions.add(other, "Treasury", "0x10", 1))).toBe("NOT_ADMIN");
    expect(codeOf(() => extensions.remove(other, ACCOUNT_PROTOCOL))).toBe("NOT_ADMIN");
    expect(codeOf(() => extensions.update(other, ACCOUNT_PROTOCOL, "0x99", 2))).toBe("NOT_ADMIN");
  });
});

// =============================================================================
// Deps
// =============================================================================

describe("Deps", () => {
  let extensions: Extensions;

  beforeEach(() => {
    const init = Extensions.init();
    extensions = init.extensions;
    extensions.add(init.cap, ACCOUNT_PROTOCOL, "0xac01", 1);
    extensions.add(init.cap, "Treasury", "0x10", 1);
  });

  it("builds from the latest extension versions", () => {
    const deps = Deps.latest(extensions, [ACCOUNT_PROTOCOL, "Treasury"]);
    expect(deps.toArray()).toEqual([
      { name: ACCOUNT_PROTOCOL, addr: "0xac01", version: 1 },
      { name: "Treasury", addr: "0x10", version: 1 },
    ]);
    expect(deps.getByName("Treasury").addr).toBe("0x10");
    expect(deps.getByAddr("0xac01").name).toBe(ACCOUNT_PROTOCOL);
    expect(deps.containsName("Treasury")).toBe(true);
    expect(deps.containsAddr("0x99")).toBe(false);
    expect(deps.unverifiedAllowed).toBe(false);
  });

  it("requires the protocol as the first entry", () => {
    expect(codeOf(() => Deps.latest(extensions, ["Treasury", ACCOUNT_PROTOCOL]))).toBe(
      "ACCOUNT_PROTOCOL_MISSING",
    );
    expect(codeOf(() => Deps.new(extensions, false, [], [], []))).toBe("ACCOUNT_PROTOCOL_MISSING");
  });

  it("rejects mismatched lengths and duplicates", () => {
    expect(
      codeOf(() => Deps.new(extensions, false, [ACCOUNT_PROTOCOL], ["0xac01", "0x10"], [1])),
    ).toBe("DEPS_NOT_SAME_LENGTH");
    expect(
      codeOf(() =>
        Deps.new(extensions, false, [ACCOUNT_PROTOCOL, "Treasury", "Treasury"], ["0xac01", "0x10", "0x10"], [1, 1, 1]),
      ),
    ).toBe("DEP_ALREADY_EXISTS");
  });

  it("requires allow-listed packages unless unverified ones are allowed", () => {
    const names = [ACCOUNT_PROTOCOL, "Custom"];
    const addrs = ["0xac01", "0xc0de"];
    expect(codeOf(() => Deps.new(extensions, false, names, addrs, [1, 1]))).toBe("NOT_EXTENSION");

    const deps = Deps.new(extensions, true, names, addrs, [1, 1]);
    expect(deps.containsAddr("0xc0de")).toBe(true);
  });

  it("always verifies the protocol entry", () => {
    expect(codeOf(() => Deps.new(extensions, true, [ACCOUNT_PROTOCOL], ["0xbad"], [1]))).toBe(
      "NOT_EXTENSION",
    );
  });

  it("gates calls by package address", () => {
    const deps = Deps.latest(extensions, [ACCOUNT_PROTOCOL, "Treasury"]);
    deps.check(versionWitness("0x10", 1));
    expect(codeOf(() => deps.check(versionWitness("0x11", 1)))).toBe("NOT_DEP");
    expect(codeOf(() => deps.getByName("Missing"))).toBe("NOT_DEP");
  });

  it("refuses a version witness it did not hand out", () => {
    const deps = Deps.latest(extensions, [ACCOUNT_PROTOCOL, "Treasury"]);
    expect(codeOf(() => deps.check({ packageAddress: "0x10", version: 1 }))).toBe("WRONG_WITNESS");
  });

  it("copies itself with a new unverified flag", () => {
    const deps = Deps.latest(extensions, [ACCOUNT_PROTOCOL]);
    const toggled = deps.withUnverifiedAllowed(true);
    expect(toggled.unverifiedAllowed).toBe(true);
    expect(deps.unverifiedAllowed).toBe(false);
    expect(toggled.toArray()).toEqual(deps.toArray());
  });
});

// =============================================================================
// Metadata
// =============================================================================

describe("Metadata", () => {
  it("keeps keys in insertion order with the name first", () => {
    const metadata = Metadata.fromKeysValues(["name", "website"], ["Treasury", "example.org"]);
    expect(metadata.keys()).toEqual(["name", "website"]);
    expect(metadata.get("website")).toBe("example.org");
    expect(metadata.toJSON()).toEqual({ name: "Treasury", website: "example.org" });
  });

  it("accepts an empty list", () => {
    expect(Metadata.fromKeysValues([], []).size).toBe(0);
  });

  it("rejects malformed lists", () => {
    expect(codeOf(() => Metadata.fromKeysValues(["name"], []))).toBe("METADATA_NOT_SAME_LENGTH");
    expect(codeOf(() => Metadata.fromKeysValues(["website"], ["x"]))).toBe(
      "METADATA_NAME_MISSING",
    );
    expect(codeOf(() => Metadata.fromKeysValues(["name"], [""]))).toBe("NAME_CANNOT_BE_EMPTY");
    expect(codeOf(() => Metadata.fromKeysValues(["name", "a", "a"], ["n", "1", "2"]))).toBe(
      "METADATA_KEY_EXISTS",
    );
  });
});
