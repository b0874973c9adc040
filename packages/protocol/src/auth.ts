/**
 * Auth — proof that the caller passed the account policy's authentication.
 *
 * Produced by the policy module through `Account.newAuth` and consumed by
 * the first privileged call it is presented to.
 */

import type { Address } from "@covenant/types";
import { LinearResource } from "./resource.js";

export class Auth extends LinearResource {
  readonly resourceKind = "auth" as const;
  readonly accountAddress: Address;

  /** @internal created by Account.newAuth */
  constructor(accountAddress: Address) {
    super();
    this.accountAddress = accountAddress;
  }

  describe(): string {
    return `Auth for account ${this.accountAddress}`;
  }
}
