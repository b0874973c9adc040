/**
 * The account policy interface: a pluggable approval rule.
 *
 * The engine never interprets `Config` or `Outcome`. It asks the policy
 * for a verdict at execution time and lets the policy's own functions
 * update outcomes and config through the config witness.
 */

export type PolicyVerdict =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: Error };

export interface AccountPolicy<Config, Outcome> {
  /**
   * Type of the witness held by the module that owns `Config`. Only that
   * witness can update outcomes and config.
   */
  readonly configWitnessType: string;

  /** Account type name, e.g. "multisig" */
  readonly name: string;

  /**
   * Decide whether an intent's outcome authorizes execution under `role`.
   */
  validate(outcome: Outcome, config: Config, role: string): PolicyVerdict;
}

export const APPROVED: PolicyVerdict = Object.freeze({ ok: true });

export function rejected(error: Error): PolicyVerdict {
  return { ok: false, error };
}
