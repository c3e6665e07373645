/**
 * Reconciliation Module
 *
 * Field-level diffs for the upload direction and the merge rules for the
 * download direction.
 */

export * from "./models/diff.js";
export * from "./diff-engine.js";
export * from "./merge-engine.js";
