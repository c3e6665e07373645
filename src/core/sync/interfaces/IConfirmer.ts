/**
 * Confirmation Interface
 *
 * Human-in-the-loop decisions the sync engine asks for. Implementations live
 * in the CLI; the engine only sees booleans and id sets.
 */

import type { ConfirmedChange, CreationCandidate, PendingUpdate } from "../../reconciliation/models/diff.js";

export interface IConfirmer {
  /**
   * Single yes/no for the whole batch of products to create.
   */
  confirmCreation(candidates: CreationCandidate[]): Promise<boolean>;

  /**
   * Lets the operator pick which diffs to push.
   */
  selectChanges(updates: PendingUpdate[]): Promise<ConfirmedChange[]>;

  /**
   * Final yes/no before any update call is made.
   */
  confirm(message: string): Promise<boolean>;
}
