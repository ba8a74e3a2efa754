import { describe, it, expect } from "vitest";
import { JobQueue } from "../../src/orchestration/job-queue";

function sequentialIds() {
  let next = 0;
  return () => `job-${++next}`;
}

describe("JobQueue", () => {
  it("runs jobs one at a time in submission order", async () => {
    const queue = new JobQueue(sequentialIds());
    const events: string[] = [];

    queue.enqueue("first", async () => {
      events.push("first:start");
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push("first:end");
    });
    queue.enqueue("second", async () => {
      events.push("second:start");
    });

    await queue.drain();
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("records results and failures without stopping later jobs", async () => {
    const queue = new JobQueue(sequentialIds());

    const failing = queue.enqueue("boom", async () => {
      throw new Error("exploded");
    });
    const ok = queue.enqueue("ok", async () => 42);

    expect(failing.status).toBe("queued");
    await queue.drain();

    expect(queue.get(failing.id)).toMatchObject({ status: "failed", error: "exploded" });
    expect(queue.get(ok.id)).toMatchObject({ status: "succeeded", result: 42, error: null });
    expect(queue.list().map((job) => job.id)).toEqual(["job-2", "job-1"]);
  });

  it("returns null for unknown jobs", () => {
    expect(new JobQueue().get("missing")).toBeNull();
  });
});
