/**
 * Confirmer Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import * as p from "@clack/prompts";
import { AutoConfirmer, PromptConfirmer } from "../confirmers.js";
import type { PendingUpdate } from "../../core/reconciliation/models/diff.js";

vi.mock("@clack/prompts", () => ({
  note: vi.fn(),
  confirm: vi.fn(),
  multiselect: vi.fn(),
  isCancel: (value: unknown) => value === Symbol.for("test-cancel"),
}));

const CANCEL = Symbol.for("test-cancel");

function pending(kind: PendingUpdate["kind"], id: number): PendingUpdate {
  return {
    kind,
    diff: { name: `item-${id}`, id, fields: [{ field: "price", remote: 1, local: 2, status: "changed" }] },
  };
}

const updates = [pending("product", 4), pending("gamepass", 4)];

describe("AutoConfirmer", () => {
  it("accepts everything", async () => {
    const confirmer = new AutoConfirmer();

    expect(await confirmer.confirmCreation()).toBe(true);
    expect(await confirmer.confirm()).toBe(true);
    expect(await confirmer.selectChanges(updates)).toEqual([
      { kind: "product", id: 4 },
      { kind: "gamepass", id: 4 },
    ]);
  });
});

describe("PromptConfirmer", () => {
  beforeEach(() => {
    vi.mocked(p.note).mockReset();
    vi.mocked(p.confirm).mockReset();
    vi.mocked(p.multiselect).mockReset();
  });

  it("pre-selects every diff and maps the answer back", async () => {
    vi.mocked(p.multiselect).mockResolvedValue(["gamepass:4"]);

    const selected = await new PromptConfirmer().selectChanges(updates);

    expect(selected).toEqual([{ kind: "gamepass", id: 4 }]);
    expect(vi.mocked(p.multiselect).mock.calls[0]?.[0]).toMatchObject({
      initialValues: ["product:4", "gamepass:4"],
    });
    expect(p.note).toHaveBeenCalledTimes(1);
  });

  it("treats a cancelled selection as empty", async () => {
    vi.mocked(p.multiselect).mockResolvedValue(CANCEL);

    expect(await new PromptConfirmer().selectChanges(updates)).toEqual([]);
  });

  it("treats a cancelled confirmation as no", async () => {
    vi.mocked(p.confirm).mockResolvedValue(CANCEL);

    expect(await new PromptConfirmer().confirm("Proceed?")).toBe(false);
  });

  it("asks once for the whole creation batch", async () => {
    vi.mocked(p.confirm).mockResolvedValue(true);

    const answer = await new PromptConfirmer().confirmCreation([
      { kind: "gamepass", key: "vip", fields: [] },
      { kind: "product", key: "coins", fields: [] },
    ]);

    expect(answer).toBe(true);
    expect(p.confirm).toHaveBeenCalledWith({
      message: "Would you like to upload 2 non-existent products?",
      initialValue: false,
    });
  });
});
