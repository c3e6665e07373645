/**
 * Terminal rendering of product diffs and creation previews.
 */

import chalk, { Chalk } from "chalk";
import { kindLabel, type ProductKind } from "../core/catalog/models.js";
import type {
  CreationCandidate,
  DiffField,
  FieldChange,
  PendingUpdate,
} from "../core/reconciliation/models/diff.js";

const FIELD_LABELS: Record<DiffField, string> = {
  title: "Title",
  description: "Description",
  price: "Price",
  regionalPricing: "Regional pricing",
  active: "For sale",
};

const LABEL_WIDTH = 18;

const plain = new Chalk({ level: 0 });

export function formatValue(value: string | number | boolean | null): string {
  if (value === null) return "-";
  if (typeof value === "boolean") return value ? "yes" : "no";
  if (typeof value === "number") return String(value);
  return JSON.stringify(value);
}

export function updateLabel(update: PendingUpdate): string {
  return `${capitalize(kindLabel(update.kind))}: ${update.diff.name} (ID: ${update.diff.id})`;
}

export function changeKey(kind: ProductKind, id: number): string {
  return `${kind}:${id}`;
}

/**
 * One line per field; changed fields show `remote → local`.
 */
export function renderFieldChanges(fields: FieldChange[], colors = true): string[] {
  const paint = colors ? chalk : plain;

  return fields.map((change) => {
    const label = `${FIELD_LABELS[change.field]}:`.padEnd(LABEL_WIDTH);
    switch (change.status) {
      case "changed":
        return `${paint.yellow("~")} ${label}${paint.red(formatValue(change.remote))} → ${paint.green(formatValue(change.local))}`;
      case "created":
        return `${paint.green("+")} ${label}${paint.green(formatValue(change.local))}`;
      default:
        return `  ${label}${paint.dim(formatValue(change.local))}`;
    }
  });
}

export function renderUpdate(update: PendingUpdate, colors = true): string {
  const paint = colors ? chalk : plain;
  return [paint.bold(updateLabel(update)), ...renderFieldChanges(update.diff.fields, colors).map((line) => `  ${line}`)].join("\n");
}

export function renderCreation(candidate: CreationCandidate, colors = true): string {
  const paint = colors ? chalk : plain;
  const header = `${capitalize(kindLabel(candidate.kind))}: ${candidate.key}`;
  return [paint.bold(header), ...renderFieldChanges(candidate.fields, colors).map((line) => `  ${line}`)].join("\n");
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
