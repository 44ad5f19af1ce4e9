import * as sinon from "sinon";
import { expect } from "chai";

import { AdminError } from "../error";
import Queue from "./queue";
import { TaskAttempt, timeToWait } from "./throttler";
import RetriesExhaustedError from "./errors/retries-exhausted-error";
import TimeoutError from "./errors/timeout-error";

const TEST_ERROR = new Error("foobar");

describe("Throttler", () => {
  it("should have no waiting task after creation", () => {
    const queue = new Queue({});
    expect(queue.hasWaitingTask()).to.equal(false);
  });

  it("should return the task as the task name", () => {
    const q = new Queue<string, void>({ handler: sinon.stub().resolves() });

    q.add("test task");

    expect(q.taskName(0)).to.equal("test task");
  });

  it("should return the index as the task name", () => {
    const q = new Queue<number, void>({ handler: sinon.stub().resolves() });

    q.add(2);

    expect(q.taskName(0)).to.equal("index 0");
  });

  it("should return 'finished task' as the task name", async () => {
    const q = new Queue<number, void>({ handler: sinon.stub().resolves() });

    q.add(2);
    q.close();
    await q.wait();

    expect(q.taskName(0)).to.equal("finished task");
  });

  it("should pass the attempt to function tasks", async () => {
    const task = sinon.stub<[TaskAttempt], Promise<void>>().resolves();
    const q = new Queue<typeof task, void>({});

    q.add(task);
    q.close();
    await q.wait();

    expect(task).to.have.been.calledOnce;
    expect(task.firstCall.args[0]).to.deep.equal({ retryCount: 0, remainingMillis: undefined });
    expect(q.stats()).to.include({ complete: 1, success: 1, errored: 0, retried: 0, total: 1 });
  });

  it("should not retry", async () => {
    const handler = sinon.stub().rejects(TEST_ERROR);
    const q = new Queue<number, void>({ handler, retries: 0 });

    q.add(4);
    q.close();

    const err = await q.wait().then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(err).to.be.an.instanceof(RetriesExhaustedError);
    expect(err).to.include({
      original: TEST_ERROR,
      code: "DEADLINE_EXCEEDED",
      message: "Task index 0 failed: retries exhausted after 1 attempts, with error: foobar",
    });
    expect(handler.callCount).to.equal(1);
    expect(q.stats()).to.include({ complete: 1, success: 0, errored: 1, retried: 0, total: 1 });
  });

  it("should carry the code of the last error when retries run out", async () => {
    const q = new Queue<number, void>({
      handler: sinon.stub().rejects(new AdminError("down", { code: "UNAVAILABLE" })),
      retries: 1,
      backoff: 0,
    });

    await expect(q.run(1)).to.be.rejectedWith(RetriesExhaustedError).and.eventually.include({
      code: "UNAVAILABLE",
    });
  });

  it("should retry the number of retries, plus one", async () => {
    const handler = sinon.stub().rejects(TEST_ERROR);
    const q = new Queue<number, void>({ backoff: 0, handler, retries: 3 });

    await expect(q.run(4))
      .to.be.rejectedWith(
        RetriesExhaustedError,
        "Task index 0 failed: retries exhausted after 4 attempts, with error: foobar",
      )
      .and.eventually.include({ attempts: 4 });
    expect(handler.callCount).to.equal(4);
    expect(q.stats()).to.include({ complete: 1, success: 0, errored: 1, retried: 3, total: 1 });
  });

  it("should tell the handler which retry it is running", async () => {
    const handler = sinon
      .stub<[string, TaskAttempt], Promise<string>>()
      .rejects(TEST_ERROR)
      .onCall(2)
      .resolves("done");
    const q = new Queue<string, string>({ backoff: 0, handler, retries: 5 });

    expect(await q.run("task")).to.equal("done");
    expect(handler.getCalls().map((c) => c.args[1].retryCount)).to.deep.equal([0, 1, 2]);
  });

  it("should handle tasks in concurrency", async () => {
    const callCountMap = new Map<string, number>();
    const handler = (task: string): Promise<void> => {
      const count = (callCountMap.get(task) ?? 0) + 1;
      callCountMap.set(task, count);
      return count > 2 ? Promise.resolve() : Promise.reject(TEST_ERROR);
    };
    const q = new Queue<string, void>({ backoff: 0, concurrency: 2, handler, retries: 2 });

    q.add("1");
    q.add("2");
    q.add("3");
    q.close();
    await q.wait();

    expect(q.stats()).to.include({ complete: 3, success: 3, errored: 0, retried: 6, total: 3 });
  });

  it("should return the result of task", async () => {
    const q = new Queue<number, string>({
      handler: (task) => Promise.resolve(`result: ${task}`),
    });

    expect(await q.run(2)).to.equal("result: 2");
    expect(await q.run(3)).to.equal("result: 3");
  });

  it("should resolve if task finishes before timeout", async () => {
    const q = new Queue<number, string>({
      handler: (task) => Promise.resolve(`result: ${task}`),
    });

    expect(await q.run(2, 20000000)).to.equal("result: 2");
    expect(q.stats()).to.include({ complete: 1, success: 1, errored: 0, retried: 0, total: 1 });
  });

  it("should tell the handler how much of the timeout is left", async () => {
    const handler = sinon.stub<[number, TaskAttempt], Promise<void>>().resolves();
    const q = new Queue<number, void>({ handler });

    await q.run(1, 1000);

    const remaining = handler.firstCall.args[1].remainingMillis;
    expect(remaining).to.be.a("number").within(1, 1000);
  });

  it("should reject if timeout", async () => {
    const q = new Queue<number, string>({
      handler: (task) =>
        new Promise((resolve) => {
          setTimeout(() => resolve(`result: ${task}`), 150);
        }),
    });

    const err = await q.run(2, 100).then(
      () => undefined,
      (e: unknown) => e,
    );
    expect(err).to.be.instanceOf(TimeoutError);
    expect(err).to.include({
      code: "DEADLINE_EXCEEDED",
      message: "Task index 0 failed: timed out after 100ms.",
    });
  });

  it("should reject with RetriesExhaustedError if last trial is rejected before timeout", async () => {
    const handler = sinon.stub().rejects(TEST_ERROR);
    const q = new Queue<number, void>({ handler, retries: 2, backoff: 10 });

    await expect(q.run(2, 200)).to.be.rejectedWith(
      RetriesExhaustedError,
      "Task index 0 failed: retries exhausted after 3 attempts, with error: foobar",
    );
    expect(handler.callCount).to.equal(3);
    expect(q.stats()).to.include({ complete: 1, success: 0, errored: 1, retried: 2, total: 1 });
  });

  it("should reject with TimeoutError if timeout while retrying", async () => {
    const handler = sinon.stub().rejects(TEST_ERROR);
    const q = new Queue<number, void>({ handler, retries: 1000, backoff: 5 });

    await expect(q.run(2, 100)).to.be.rejectedWith(
      TimeoutError,
      "Task index 0 failed: timed out after 100ms.",
    );
    expect(handler.callCount).to.be.at.least(2);
    expect(q.stats()).to.include({ complete: 1, success: 0, errored: 1, total: 1 });
  });

  it("should not back off past the timeout", async () => {
    const handler = sinon.stub().rejects(TEST_ERROR);
    const q = new Queue<number, void>({
      handler,
      retries: 10,
      backoff: 60000,
      maxBackoff: 60000,
    });

    const start = Date.now();
    await expect(q.run(1, 50)).to.be.rejectedWith(TimeoutError);

    expect(Date.now() - start).to.be.below(1000);
    expect(handler.callCount).to.equal(1);
  });

  it("should reject the wait with the first failure", async () => {
    const handler = sinon.stub().rejects(TEST_ERROR).onFirstCall().resolves();
    const q = new Queue<number, void>({ handler, retries: 1, backoff: 10 });

    q.add(2);
    q.add(3, 100);
    q.close();

    await expect(q.wait()).to.be.rejectedWith(
      RetriesExhaustedError,
      "Task index 1 failed: retries exhausted after 2 attempts, with error: foobar",
    );
    expect(handler.callCount).to.equal(3);
    expect(q.stats()).to.include({ complete: 2, success: 1, errored: 1, retried: 1, total: 2 });
  });

  it("should not accept tasks once closed", () => {
    const q = new Queue<number, void>({ handler: sinon.stub().resolves() });
    q.close();

    expect(() => q.add(1)).to.throw("Cannot add a task to a closed throttler.");
  });
});

describe("timeToWait", () => {
  it("should wait the base delay on the first attempt", () => {
    expect(timeToWait(0, 100, 1000)).to.equal(100);
  });

  it("should back off exponentially", () => {
    expect(timeToWait(1, 100, 1000)).to.equal(200);
    expect(timeToWait(2, 100, 1000)).to.equal(400);
    expect(timeToWait(3, 100, 1000)).to.equal(800);
  });

  it("should use the given multiplier", () => {
    expect(timeToWait(2, 100, 10000, 1.5)).to.equal(225);
    expect(timeToWait(3, 100, 10000, 1)).to.equal(100);
  });

  it("should not wait longer than maxDelay", () => {
    expect(timeToWait(2, 300, 400)).to.equal(400);
  });
});
