/**
 * Object store — the host's ownership primitive.
 *
 * Objects are owned by exactly one address. An account receives objects
 * sent to its address by id, and sends objects it holds to others.
 */

import { randomBytes } from "node:crypto";
import type { Address, ObjectId, OwnedObject } from "@covenant/types";
import { ProtocolError } from "./errors.js";

export interface ObjectStore {
  /** Give `object` to `owner`. */
  deposit(owner: Address, object: OwnedObject): void;

  /** Take the object with `id` out of `owner`'s holdings. */
  receive(owner: Address, id: ObjectId): OwnedObject;

  ownerOf(id: ObjectId): Address | undefined;

  listOwned(owner: Address): readonly OwnedObject[];
}

/** Mint a fresh 32-byte object id. */
export function newObjectId(): ObjectId {
  return `0x${randomBytes(32).toString("hex")}`;
}

export class InMemoryObjectStore implements ObjectStore {
  private readonly _objects = new Map<ObjectId, { owner: Address; object: OwnedObject }>();

  deposit(owner: Address, object: OwnedObject): void {
    if (this._objects.has(object.id)) {
      throw new ProtocolError(
        "OBJECT_ALREADY_EXISTS",
        `Object ${object.id} is already in the store`,
      );
    }
    this._objects.set(object.id, { owner, object });
  }

  receive(owner: Address, id: ObjectId): OwnedObject {
    const record = this._objects.get(id);
    if (record === undefined) {
      throw new ProtocolError("OBJECT_NOT_FOUND", `Object ${id} not found`);
    }
    if (record.owner !== owner) {
      throw new ProtocolError(
        "WRONG_OWNER",
        `Object ${id} is owned by ${record.owner}, not ${owner}`,
      );
    }
    this._objects.delete(id);
    return record.object;
  }

  ownerOf(id: ObjectId): Address | undefined {
    return this._objects.get(id)?.owner;
  }

  listOwned(owner: Address): readonly OwnedObject[] {
    return [...this._objects.values()]
      .filter((r) => r.owner === owner)
      .map((r) => r.object);
  }

  get size(): number {
    return this._objects.size;
  }
}
