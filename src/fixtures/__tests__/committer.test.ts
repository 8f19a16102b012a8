import { describe, it, expect } from "vitest";
import { Address, Circle, Contact } from "../../models/index.js";
import type { EntityStore, Model } from "../../orm/index.js";
import { commitInReverse } from "../committer.js";
import { PersistenceError } from "../errors.js";

/* ============= helpers ============= */

class RecordingStore implements EntityStore {
  managed: Model[] = [];
  private reject: (entity: Model) => unknown;

  constructor(reject: (entity: Model) => unknown = () => undefined) {
    this.reject = reject;
  }

  manage(entity: Model): Promise<void> {
    const reason = this.reject(entity);
    if (reason !== undefined) return Promise.reject(reason);
    this.managed.push(entity);
    return Promise.resolve();
  }
}

/* ============= commitInReverse ============= */

describe("commitInReverse", () => {
  it("manages entities last-constructed first", async () => {
    const circle = new Circle();
    const contact = new Contact();
    const address = new Address();
    const store = new RecordingStore();

    const report = await commitInReverse([circle, contact, address], store);

    expect(store.managed).toEqual([address, contact, circle]);
    expect(store.managed[0]).toBe(address);
    expect(store.managed[2]).toBe(circle);
    expect(report).toEqual({ attempted: 3, managed: 3, failures: [] });
  });

  it("keeps going after a failure and reports it", async () => {
    const circle = new Circle();
    const contact = new Contact();
    const address = new Address();
    const cause = new Error("cannot store Contact");
    const store = new RecordingStore(e => (e instanceof Contact ? cause : undefined));

    const report = await commitInReverse([circle, contact, address], store);

    expect(store.managed).toHaveLength(2);
    expect(store.managed[0]).toBe(address);
    expect(store.managed[1]).toBe(circle);
    expect(report.attempted).toBe(3);
    expect(report.managed).toBe(2);
    expect(report.failures).toHaveLength(1);

    const [failure] = report.failures;
    expect(failure).toBeInstanceOf(PersistenceError);
    expect(failure.entityType).toBe("Contact");
    expect(failure.index).toBe(1);
    expect(failure.cause).toBe(cause);
    expect(failure.message).toBe("Failed to persist Contact #1: cannot store Contact");
  });

  it("reports every failing entity", async () => {
    const store = new RecordingStore(() => new Error("down"));

    const report = await commitInReverse([new Circle(), new Circle()], store);

    expect(report.managed).toBe(0);
    expect(report.failures.map(f => f.index)).toEqual([1, 0]);
  });

  it("describes non-Error rejections", async () => {
    const store = new RecordingStore(() => "disk full");

    const report = await commitInReverse([new Circle()], store);

    expect(report.failures[0].message).toBe("Failed to persist Circle #0: disk full");
  });

  it("does nothing for an empty record", async () => {
    const store = new RecordingStore();

    const report = await commitInReverse([], store);

    expect(report).toEqual({ attempted: 0, managed: 0, failures: [] });
    expect(store.managed).toHaveLength(0);
  });
});
