/**
 * Approvals — the outcome attached to each multisig intent.
 *
 * Only the approving addresses are stored. Weights are summed against the
 * config passed in, so a member removed after approving no longer counts
 * and a reweighted member counts at their current weight.
 *
 * Instances are built inside this package only: the class is exported
 * from the package as a type, and its private field keeps plain objects
 * from passing for it.
 */

import type { Address } from "@covenant/types";
import type { MultisigConfig } from "./types.js";

export interface ApprovalWeights {
  readonly totalWeight: number;
  /** Weight of current approvers holding the intent's role */
  readonly roleWeight: number;
}

export class Approvals {
  private readonly approvers: readonly Address[];

  constructor(approvers: readonly Address[]) {
    this.approvers = Object.freeze([...approvers]);
    Object.freeze(this);
  }

  get approved(): readonly Address[] {
    return this.approvers;
  }

  includes(addr: Address): boolean {
    return this.approvers.includes(addr);
  }

  weights(config: MultisigConfig, role: string): ApprovalWeights {
    let totalWeight = 0;
    let roleWeight = 0;
    for (const member of config.members) {
      if (!this.approvers.includes(member.addr)) continue;
      totalWeight += member.weight;
      if (member.roles.includes(role)) {
        roleWeight += member.weight;
      }
    }
    return { totalWeight, roleWeight };
  }
}

export function noApprovals(): Approvals {
  return new Approvals([]);
}

export function withApproval(approvals: Approvals, addr: Address): Approvals {
  return new Approvals([...approvals.approved, addr]);
}

export function withoutApproval(approvals: Approvals, addr: Address): Approvals {
  return new Approvals(approvals.approved.filter((a) => a !== addr));
}
