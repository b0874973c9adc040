/**
 * Allow-list of verified packages.
 *
 * Each extension has a name and a version history of (address, version)
 * pairs. Accounts that do not allow unverified dependencies can only
 * depend on entries found here. Administered through an AdminCap.
 */

import type { Address } from "@covenant/types";
import { ProtocolError } from "./errors.js";

export const ACCOUNT_PROTOCOL = "AccountProtocol";

export interface ExtensionVersion {
  readonly addr: Address;
  readonly version: number;
}

export interface Extension {
  readonly name: string;
  readonly history: readonly ExtensionVersion[];
}

/**
 * Capability required to modify the allow-list.
 */
export class AdminCap {
  private readonly _brand = "AdminCap";

  toString(): string {
    return this._brand;
  }
}

export class Extensions {
  private readonly _cap: AdminCap;
  private readonly _inner: Extension[] = [];

  private constructor(cap: AdminCap) {
    this._cap = cap;
  }

  /**
   * Create an empty allow-list and the capability that administers it.
   */
  static init(): { readonly extensions: Extensions; readonly cap: AdminCap } {
    const cap = new AdminCap();
    return { extensions: new Extensions(cap), cap };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Admin
  // ───────────────────────────────────────────────────────────────────────

  add(cap: AdminCap, name: string, addr: Address, version: number): void {
    this.assertAdmin(cap);
    if (this._inner.some((e) => e.name === name || e.history.some((h) => h.addr === addr))) {
      throw new ProtocolError(
        "EXTENSION_ALREADY_EXISTS",
        `Extension '${name}' or address ${addr} is already registered`,
      );
    }
    this._inner.push({ name, history: [{ addr, version }] });
  }

  remove(cap: AdminCap, name: string): void {
    this.assertAdmin(cap);
    if (name === ACCOUNT_PROTOCOL) {
      throw new ProtocolError(
        "CANNOT_REMOVE_ACCOUNT_PROTOCOL",
        `${ACCOUNT_PROTOCOL} cannot be removed from the extensions`,
      );
    }
    const idx = this.indexOf(name);
    this._inner.splice(idx, 1);
  }

  /**
   * Register a new version of an existing extension.
   */
  update(cap: AdminCap, name: string, addr: Address, version: number): void {
    this.assertAdmin(cap);
    const idx = this.indexOf(name);
    if (this._inner.some((e) => e.history.some((h) => h.addr === addr))) {
      throw new ProtocolError(
        "EXTENSION_ALREADY_EXISTS",
        `Address ${addr} is already registered`,
      );
    }
    const latest = this.getLatestForName(name);
    if (version <= latest.version) {
      throw new ProtocolError(
        "VERSION_NOT_INCREASING",
        `Version ${version} of '${name}' must be greater than ${latest.version}`,
      );
    }
    const current = this._inner[idx];
    if (current !== undefined) {
      this._inner[idx] = { name, history: [...current.history, { addr, version }] };
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isExtension(name: string, addr: Address, version: number): boolean {
    const ext = this._inner.find((e) => e.name === name);
    return ext !== undefined && ext.history.some((h) => h.addr === addr && h.version === version);
  }

  getLatestForName(name: string): ExtensionVersion {
    const ext = this._inner[this.indexOf(name)];
    const latest = ext?.history[ext.history.length - 1];
    if (latest === undefined) {
      throw new ProtocolError("EXTENSION_NOT_FOUND", `Extension '${name}' not found`);
    }
    return latest;
  }

  list(): readonly Extension[] {
    return [...this._inner];
  }

  get length(): number {
    return this._inner.length;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private assertAdmin(cap: AdminCap): void {
    if (cap !== this._cap) {
      throw new ProtocolError("NOT_ADMIN", "AdminCap does not administer these extensions");
    }
  }

  private indexOf(name: string): number {
    const idx = this._inner.findIndex((e) => e.name === name);
    if (idx === -1) {
      throw new ProtocolError("EXTENSION_NOT_FOUND", `Extension '${name}' not found`);
    }
    return idx;
  }
}
