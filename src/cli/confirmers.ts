/**
 * Confirmation prompts for the sync command.
 *
 * PromptConfirmer asks through @clack/prompts; AutoConfirmer answers yes to
 * everything for `--yes`. A cancelled prompt (Ctrl+C, Escape) counts as "no".
 */

import * as p from "@clack/prompts";
import type { IConfirmer } from "../core/sync/interfaces/IConfirmer.js";
import type {
  ConfirmedChange,
  CreationCandidate,
  PendingUpdate,
} from "../core/reconciliation/models/diff.js";
import { changeKey, renderCreation, renderUpdate, updateLabel } from "./diff-display.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("prompts");

export class PromptConfirmer implements IConfirmer {
  async confirmCreation(candidates: CreationCandidate[]): Promise<boolean> {
    p.note(candidates.map((candidate) => renderCreation(candidate)).join("\n\n"), "New products");
    return this.confirm(
      `Would you like to upload ${candidates.length} non-existent product${candidates.length === 1 ? "" : "s"}?`
    );
  }

  async selectChanges(updates: PendingUpdate[]): Promise<ConfirmedChange[]> {
    p.note(updates.map((update) => renderUpdate(update)).join("\n\n"), "Differences");

    const byKey = new Map(
      updates.map((update) => [changeKey(update.kind, update.diff.id), update] as const)
    );

    const selection = await p.multiselect({
      message: "Select the products to sync",
      options: updates.map((update) => ({
        value: changeKey(update.kind, update.diff.id),
        label: updateLabel(update),
      })),
      initialValues: [...byKey.keys()],
      required: false,
    });

    if (p.isCancel(selection)) {
      logger.debug("Selection cancelled");
      return [];
    }

    const confirmed: ConfirmedChange[] = [];
    for (const key of selection) {
      const update = byKey.get(key);
      if (update) {
        confirmed.push({ kind: update.kind, id: update.diff.id });
      }
    }
    return confirmed;
  }

  async confirm(message: string): Promise<boolean> {
    const answer = await p.confirm({ message, initialValue: false });
    if (p.isCancel(answer)) {
      logger.debug({ message }, "Prompt cancelled");
      return false;
    }
    return answer;
  }
}

/**
 * Confirms every prompt and selects every diff.
 */
export class AutoConfirmer implements IConfirmer {
  async confirmCreation(): Promise<boolean> {
    return true;
  }

  async selectChanges(updates: PendingUpdate[]): Promise<ConfirmedChange[]> {
    return updates.map(({ kind, diff }) => ({ kind, id: diff.id }));
  }

  async confirm(): Promise<boolean> {
    return true;
  }
}
