/**
 * Building and checking a multisig config.
 *
 * A config is valid when:
 * - every member appears once, with a positive integer weight
 * - the global threshold is positive and reachable by the total weight
 * - every role a member holds is declared, once
 * - every role threshold is positive and reachable by its holders' weight
 */

import { MultisigError } from "./errors.js";
import type { Member, MultisigConfig, MultisigRulesInput, Role } from "./types.js";

export function newConfig(input: MultisigRulesInput): MultisigConfig {
  const { addresses, weights, roles, roleNames, roleThresholds } = input;
  if (addresses.length !== weights.length || addresses.length !== roles.length) {
    throw new MultisigError(
      "MEMBERS_NOT_SAME_LENGTH",
      `Got ${addresses.length} addresses, ${weights.length} weights and ${roles.length} role lists`,
    );
  }
  if (roleNames.length !== roleThresholds.length) {
    throw new MultisigError(
      "ROLES_NOT_SAME_LENGTH",
      `Got ${roleNames.length} role names and ${roleThresholds.length} thresholds`,
    );
  }

  const members: Member[] = addresses.map((addr, i) => ({
    addr,
    weight: weights[i] ?? 0,
    roles: [...(roles[i] ?? [])],
  }));
  const declared: Role[] = roleNames.map((name, i) => ({
    name,
    threshold: roleThresholds[i] ?? 0,
  }));

  const config: MultisigConfig = { members, global: input.global, roles: declared };
  verifyRules(config);
  return config;
}

export function verifyRules(config: MultisigConfig): void {
  const seen = new Set<string>();
  let total = 0;
  for (const member of config.members) {
    if (seen.has(member.addr)) {
      throw new MultisigError("DUPLICATE_MEMBER", `Member ${member.addr} is listed twice`);
    }
    if (!Number.isSafeInteger(member.weight) || member.weight <= 0) {
      throw new MultisigError(
        "INVALID_WEIGHT",
        `Member ${member.addr} has weight ${member.weight}; weights are positive integers`,
      );
    }
    seen.add(member.addr);
    total += member.weight;
  }

  if (config.global <= 0) {
    throw new MultisigError("THRESHOLD_NULL", "Global threshold must be positive");
  }
  if (config.global > total) {
    throw new MultisigError(
      "THRESHOLD_TOO_HIGH",
      `Global threshold ${config.global} exceeds total weight ${total}`,
    );
  }

  const roleNames = new Set<string>();
  for (const role of config.roles) {
    if (roleNames.has(role.name)) {
      throw new MultisigError("DUPLICATE_ROLE", `Role '${role.name}' is listed twice`);
    }
    roleNames.add(role.name);
  }

  for (const member of config.members) {
    for (const role of member.roles) {
      if (!roleNames.has(role)) {
        throw new MultisigError(
          "ROLE_NOT_ADDED",
          `Member ${member.addr} holds role '${role}' which has no threshold`,
        );
      }
    }
  }

  for (const role of config.roles) {
    if (role.threshold <= 0) {
      throw new MultisigError("THRESHOLD_NULL", `Threshold of role '${role.name}' must be positive`);
    }
    const holders = config.members
      .filter((m) => m.roles.includes(role.name))
      .reduce((sum, m) => sum + m.weight, 0);
    if (role.threshold > holders) {
      throw new MultisigError(
        "ROLE_THRESHOLD_TOO_HIGH",
        `Threshold ${role.threshold} of role '${role.name}' exceeds its members' weight ${holders}`,
      );
    }
  }
}

// ─── Queries ────────────────────────────────────────────────────────

export function isMember(config: MultisigConfig, addr: string): boolean {
  return config.members.some((m) => m.addr === addr);
}

export function getMember(config: MultisigConfig, addr: string): Member {
  const member = config.members.find((m) => m.addr === addr);
  if (member === undefined) {
    throw new MultisigError("NOT_MEMBER", `${addr} is not a member`);
  }
  return member;
}

export function memberWeight(config: MultisigConfig, addr: string): number {
  return getMember(config, addr).weight;
}

export function totalWeight(config: MultisigConfig): number {
  return config.members.reduce((sum, m) => sum + m.weight, 0);
}

export function getRole(config: MultisigConfig, name: string): Role | undefined {
  return config.roles.find((r) => r.name === name);
}
