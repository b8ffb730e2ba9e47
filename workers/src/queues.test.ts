import { describe, it, expect, vi, beforeEach } from "vitest";
import { tok } from "./test/fixtures/tokens.js";

// Mock dependencies
const mockAdd = vi.fn();
const mockQueueClose = vi.fn();
const mockRedisOn = vi.fn();
const mockQuit = vi.fn();

vi.mock("bullmq", () => ({
  Queue: vi.fn(function () {
    return { add: mockAdd, close: mockQueueClose };
  }),
}));

vi.mock("ioredis", () => ({
  Redis: vi.fn(function () {
    return { on: mockRedisOn, quit: mockQuit };
  }),
}));

// Import after mocking
const { Queue } = await import("bullmq");
const { queueDocumentForExtraction, closeQueues, LAB_EXTRACT_QUEUE } =
  await import("./queues.js");

const tokens = [tok("WBC", 10, 10)];

describe("queues", () => {
  beforeEach(() => {
    mockAdd.mockReset();
    mockAdd.mockImplementation(async (_name: string, _data: unknown, opts: { jobId: string }) => ({
      id: opts.jobId,
    }));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("should keep finished jobs long enough to deduplicate re-queued documents", () => {
    expect(Queue).toHaveBeenCalledWith(
      LAB_EXTRACT_QUEUE,
      expect.objectContaining({
        defaultJobOptions: expect.objectContaining({
          removeOnComplete: { age: 24 * 60 * 60, count: 1000 },
          removeOnFail: { age: 7 * 24 * 60 * 60 },
        }),
      }),
    );
  });

  it("should derive the job id from the document id", async () => {
    const first = await queueDocumentForExtraction({ documentId: "doc-1", tokens });
    const second = await queueDocumentForExtraction({ documentId: "doc-1", tokens });

    expect(first).toBe("doc-1-lab-extract");
    expect(second).toBe(first);
    expect(mockAdd).toHaveBeenCalledTimes(2);
    expect(mockAdd.mock.calls[1][2]).toEqual(mockAdd.mock.calls[0][2]);
  });

  it("should prioritize by source unless a priority is given", async () => {
    await queueDocumentForExtraction({ documentId: "doc-2", tokens, source: "batch" });
    await queueDocumentForExtraction({ documentId: "doc-3", tokens, priority: 3 });

    expect(mockAdd).toHaveBeenNthCalledWith(
      1,
      "extract",
      { documentId: "doc-2", tokens, options: undefined, source: "batch" },
      { jobId: "doc-2-lab-extract", priority: 10 },
    );
    expect(mockAdd).toHaveBeenNthCalledWith(
      2,
      "extract",
      { documentId: "doc-3", tokens, options: undefined, source: "api" },
      { jobId: "doc-3-lab-extract", priority: 3 },
    );
  });

  it("should close the queue and the Redis connection", async () => {
    await closeQueues();

    expect(mockQueueClose).toHaveBeenCalled();
    expect(mockQuit).toHaveBeenCalled();
  });
});
