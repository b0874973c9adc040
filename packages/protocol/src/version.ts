/**
 * Identity of this package as seen by account Deps.
 */

import type { Address } from "@covenant/types";
import { ACCOUNT_PROTOCOL } from "./extensions.js";
import { versionWitness } from "./witness.js";

export const PROTOCOL_NAME = ACCOUNT_PROTOCOL;
export const PROTOCOL_ADDRESS: Address = "0xac01";
export const PROTOCOL_VERSION_NUMBER = 1;

/** Presented by the protocol's own modules (owned, config) when they call into an account. */
export const PROTOCOL_VERSION = versionWitness(PROTOCOL_ADDRESS, PROTOCOL_VERSION_NUMBER);
