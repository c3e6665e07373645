/**
 * Diff models shared by the reconciliation engine and the presentation layer.
 */

import type { ProductKind } from "../../catalog/models.js";

export type DiffField = "title" | "description" | "price" | "regionalPricing" | "active";

interface FieldValues {
  title: string;
  description: string;
  price: number;
  regionalPricing: boolean;
  active: boolean;
}

export type ChangeStatus = "unchanged" | "changed" | "created";

/**
 * One compared field. `remote` is the platform value (absent for creations),
 * `local` the value the upload would send.
 */
export type FieldChange = {
  [F in DiffField]: {
    status: ChangeStatus;
    field: F;
    remote: FieldValues[F] | null;
    local: FieldValues[F];
  };
}[DiffField];

export interface ProductDiff {
  name: string;
  id: number;
  fields: FieldChange[];
}

/**
 * A diff awaiting confirmation, tagged with the collection it belongs to.
 */
export interface PendingUpdate {
  kind: ProductKind;
  diff: ProductDiff;
}

/**
 * A product the operator accepted for upload.
 */
export interface ConfirmedChange {
  kind: ProductKind;
  id: number;
}

/**
 * A local product without a remote id, proposed for creation.
 */
export interface CreationCandidate {
  kind: ProductKind;
  key: string;
  fields: FieldChange[];
}

export function hasChanges(diff: ProductDiff): boolean {
  return diff.fields.some((change) => change.status === "changed");
}

export function changedFields(diff: ProductDiff): FieldChange[] {
  return diff.fields.filter((change) => change.status === "changed");
}
