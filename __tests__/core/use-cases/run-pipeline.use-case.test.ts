import { describe, expect, it } from "vitest";
import { AuthenticationError } from "../../../src/core/domain/errors/api.errors.js";
import { ReprocessErrorsUseCase } from "../../../src/core/use-cases/reprocess-errors.use-case.js";
import { RunPipelineUseCase } from "../../../src/core/use-cases/run-pipeline.use-case.js";
import { createHarness, Harness } from "../../helpers/harness.js";
import { makeNote, makeTag } from "../../helpers/fixtures.js";

function pipelineFor(h: Harness): RunPipelineUseCase {
  let clock = 1000;
  return new RunPipelineUseCase(
    h.registry,
    new ReprocessErrorsUseCase(h.ledger, h.registry, h.logger),
    h.logger,
    () => (clock += 250),
  );
}

describe("RunPipelineUseCase", () => {
  it("loads every type in order, isolating a failing type", async () => {
    const h = createHarness();
    h.api.tags.set(1, makeTag(1));
    h.api.notes.set(1, makeNote(1));
    h.api.failOn("listNotes:0", new AuthenticationError("Authentication failed (401)"));

    const result = await pipelineFor(h).runAll();

    expect(result).toEqual({ totalRecords: 1, successCount: 1, failedCount: 1 });
    const listed = h.api.calls.filter((c) => c.startsWith("list") && !c.startsWith("listCustomFields"));
    expect(listed).toEqual([
      "listTags:0",
      "listProducts:0",
      "listContacts:0",
      "listOpportunities:0",
      "listAffiliates:0",
      "listOrders:0",
      "listTasks:0",
      "listNotes:0",
      "listCampaigns:0",
      "listSubscriptions:0",
    ]);
    expect(h.logger.messages("error")).toContain("Loading notes failed, continuing");
    expect(h.logger.messages("info")).toContain("Reprocessing complete");
    const summary = h.logger.entries.find((e) => e.message === "Full load complete");
    expect(summary?.data).toEqual({ total: 1, success: 1, failed: 1, durationMs: 250 });
  });

  it("loads one record by id", async () => {
    const h = createHarness();
    h.api.notes.set(7, makeNote(7));
    const pipeline = pipelineFor(h);

    await expect(pipeline.runOne("notes", { entityId: 7 })).resolves.toEqual({
      totalRecords: 1,
      successCount: 1,
      failedCount: 0,
    });
    await expect(pipeline.runOne("notes", { entityId: 8 })).resolves.toEqual({
      totalRecords: 1,
      successCount: 0,
      failedCount: 1,
    });
  });

  it("loads one type without the error pass", async () => {
    const h = createHarness();
    h.api.tags.set(1, makeTag(1));
    h.api.tags.set(2, makeTag(2));

    const result = await pipelineFor(h).runOne("tags", { batchSize: 1 });

    expect(result).toEqual({ totalRecords: 2, successCount: 2, failedCount: 0 });
    expect(h.logger.messages("info")).toContain("Load of tags complete");
    expect(h.logger.messages("info")).not.toContain("Reprocessing complete");
  });
});
