/**
 * Tests for multisig rule validation and queries.
 */

import { describe, it, expect } from "vitest";
import { getMember, getRole, isMember, memberWeight, newConfig, totalWeight } from "../src/rules.js";
import type { MultisigRulesInput } from "../src/types.js";
import { ALICE, BOB, CAROL, codeOf } from "./helpers.js";

const VALID: MultisigRulesInput = {
  addresses: [ALICE, BOB, CAROL],
  weights: [1, 2, 3],
  roles: [["treasury"], ["treasury"], []],
  global: 4,
  roleNames: ["treasury"],
  roleThresholds: [2],
};

function rules(overrides: Partial<MultisigRulesInput>): MultisigRulesInput {
  return { ...VALID, ...overrides };
}

describe("newConfig", () => {
  it("builds members and roles from parallel lists", () => {
    expect(newConfig(VALID)).toEqual({
      members: [
        { addr: ALICE, weight: 1, roles: ["treasury"] },
        { addr: BOB, weight: 2, roles: ["treasury"] },
        { addr: CAROL, weight: 3, roles: [] },
      ],
      global: 4,
      roles: [{ name: "treasury", threshold: 2 }],
    });
  });

  it("accepts a global threshold equal to the total weight", () => {
    expect(newConfig(rules({ global: 6 })).global).toBe(6);
  });

  it("rejects lists of different lengths", () => {
    expect(codeOf(() => newConfig(rules({ weights: [1, 2] })))).toBe("MEMBERS_NOT_SAME_LENGTH");
    expect(codeOf(() => newConfig(rules({ roles: [[], []] })))).toBe("MEMBERS_NOT_SAME_LENGTH");
    expect(codeOf(() => newConfig(rules({ roleThresholds: [] })))).toBe("ROLES_NOT_SAME_LENGTH");
  });

  it("rejects duplicate members and bad weights", () => {
    expect(codeOf(() => newConfig(rules({ addresses: [ALICE, ALICE, CAROL] })))).toBe(
      "DUPLICATE_MEMBER",
    );
    expect(codeOf(() => newConfig(rules({ weights: [0, 2, 3] })))).toBe("INVALID_WEIGHT");
    expect(codeOf(() => newConfig(rules({ weights: [1.5, 2, 3] })))).toBe("INVALID_WEIGHT");
  });

  it("bounds the global threshold", () => {
    expect(codeOf(() => newConfig(rules({ global: 0 })))).toBe("THRESHOLD_NULL");
    expect(codeOf(() => newConfig(rules({ global: 7 })))).toBe("THRESHOLD_TOO_HIGH");
  });

  it("requires every held role to be declared once", () => {
    expect(
      codeOf(() => newConfig(rules({ roleNames: ["treasury", "treasury"], roleThresholds: [1, 1] }))),
    ).toBe("DUPLICATE_ROLE");
    expect(codeOf(() => newConfig(rules({ roles: [["payroll"], [], []] })))).toBe("ROLE_NOT_ADDED");
  });

  it("bounds role thresholds by their holders' weight", () => {
    expect(codeOf(() => newConfig(rules({ roleThresholds: [0] })))).toBe("THRESHOLD_NULL");
    expect(newConfig(rules({ roleThresholds: [3] })).roles).toEqual([{ name: "treasury", threshold: 3 }]);
    expect(codeOf(() => newConfig(rules({ roleThresholds: [4] })))).toBe("ROLE_THRESHOLD_TOO_HIGH");
  });

  it("rejects a declared role nobody holds", () => {
    expect(
      codeOf(() => newConfig(rules({ roleNames: ["treasury", "idle"], roleThresholds: [2, 1] }))),
    ).toBe("ROLE_THRESHOLD_TOO_HIGH");
  });
});

describe("queries", () => {
  const config = newConfig(VALID);

  it("finds members and their weight", () => {
    expect(isMember(config, BOB)).toBe(true);
    expect(isMember(config, "0xd00d")).toBe(false);
    expect(memberWeight(config, CAROL)).toBe(3);
    expect(getMember(config, ALICE).roles).toEqual(["treasury"]);
    expect(codeOf(() => getMember(config, "0xd00d"))).toBe("NOT_MEMBER");
  });

  it("sums weights and looks up roles", () => {
    expect(totalWeight(config)).toBe(6);
    expect(getRole(config, "treasury")).toEqual({ name: "treasury", threshold: 2 });
    expect(getRole(config, "payroll")).toBeUndefined();
  });
});
