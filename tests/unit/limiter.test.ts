import { createLimiter, settleWithConcurrency } from "../../src/shared/concurrency/limiter";

describe("createLimiter", () => {
  it("limits concurrency", async () => {
    const limit = createLimiter(2);
    let active = 0;
    let maxActive = 0;

    const work = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((r) => setTimeout(r, 20));
      active -= 1;
    };

    await Promise.all(Array.from({ length: 10 }, () => limit(work)));
    expect(maxActive).toBe(2);
  });

  it("rejects a concurrency below 1", () => {
    expect(() => createLimiter(0)).toThrow("concurrency must be an integer >= 1");
  });
});

describe("settleWithConcurrency", () => {
  it("runs one item at a time with concurrency 1 and keeps input order", async () => {
    const started: string[] = [];
    const results = await settleWithConcurrency(["a", "b", "c"], 1, async (item) => {
      started.push(item);
      await new Promise((r) => setTimeout(r, item === "a" ? 15 : 1));
      if (item === "b") throw new Error("b failed");
      return item.toUpperCase();
    });

    expect(started).toEqual(["a", "b", "c"]);
    expect(results[0]).toEqual({ status: "fulfilled", value: "A" });
    expect(results[1].status).toBe("rejected");
    expect(results[2]).toEqual({ status: "fulfilled", value: "C" });
  });
});
