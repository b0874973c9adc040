/**
 * Action specs — the registered downcast for one action kind.
 *
 * An intent's action list is heterogeneous and open: modules compiled
 * independently of this package add their own kinds. Entries are stored
 * type-erased and only come back out through the spec that defined them.
 */

import { z } from "zod";
import { ProtocolError } from "./errors.js";

export interface ActionSpec<T> {
  /** Unique action type name ("<module>::<Action>") */
  readonly name: string;
  readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/** Payload type carried by an action spec. */
export type ActionPayload<S> = S extends ActionSpec<infer T> ? T : never;

export interface ActionEntry {
  /** Position in the intent's action list (0-based) */
  readonly index: number;
  readonly type: string;
  readonly payload: unknown;
}

export function defineAction<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): ActionSpec<T> {
  return Object.freeze({ name, schema });
}

/**
 * Validate a payload before it is stored under `spec`.
 */
export function encodeAction<T>(spec: ActionSpec<T>, index: number, payload: T): ActionEntry {
  const parsed = spec.schema.safeParse(payload);
  if (!parsed.success) {
    throw new ProtocolError(
      "WRONG_ACTION_TYPE",
      `Payload does not match action type ${spec.name}`,
      { issues: parsed.error.issues },
    );
  }
  return Object.freeze({ index, type: spec.name, payload: parsed.data });
}

/**
 * Read a stored entry back as `spec`'s payload type.
 */
export function decodeAction<T>(entry: ActionEntry, spec: ActionSpec<T>): T {
  if (entry.type !== spec.name) {
    throw new ProtocolError(
      "WRONG_ACTION_TYPE",
      `Action ${entry.index} is ${entry.type}, not ${spec.name}`,
    );
  }
  const parsed = spec.schema.safeParse(entry.payload);
  if (!parsed.success) {
    throw new ProtocolError(
      "WRONG_ACTION_TYPE",
      `Action ${entry.index} payload does not match ${spec.name}`,
      { issues: parsed.error.issues },
    );
  }
  return parsed.data;
}
