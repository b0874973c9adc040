/**
 * Identity of this package as seen by account Deps.
 */

import { versionWitness } from "@covenant/protocol";
import type { Address } from "@covenant/types";

export const ACTIONS_NAME = "AccountActions";
export const ACTIONS_ADDRESS: Address = "0xac03";
export const ACTIONS_VERSION_NUMBER = 1;

export const ACTIONS_VERSION = versionWitness(ACTIONS_ADDRESS, ACTIONS_VERSION_NUMBER);
