import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeEach } from "vitest";
import { Circle, CircleType, Contact, models } from "../../models/index.js";
import type { EntityStore, Model } from "../../orm/index.js";
import {
  ConstructionError,
  FixtureError,
  MissingFixtureError,
  ParseError,
  UnknownTagError,
} from "../errors.js";
import { Fixture } from "../fixture.js";

// Test fixtures live in ./fixtures
const ROOT = fileURLToPath(new URL(".", import.meta.url));

/* ============= helpers ============= */

class RecordingStore implements EntityStore {
  managed: Model[] = [];
  failFor: Array<new () => Model> = [];

  manage(entity: Model): Promise<void> {
    if (this.failFor.some(model => entity instanceof model)) {
      return Promise.reject(new Error(`cannot store ${entity.constructor.name}`));
    }
    this.managed.push(entity);
    return Promise.resolve();
  }
}

async function loadError(fixture: Fixture, name: string): Promise<unknown> {
  try {
    await fixture.load(name);
  } catch (err) {
    return err;
  }
  throw new Error(`${name} loaded without error`);
}

let store: RecordingStore;
let fixture: Fixture;

beforeEach(() => {
  store = new RecordingStore();
  fixture = new Fixture({ store, models, roots: [ROOT] });
});

/* ============= successful loads ============= */

describe("Fixture.load", () => {
  it("builds anchored entities once and commits them in reverse order", async () => {
    const report = await fixture.load("circles.yml");

    expect(report).toEqual({
      fixture: "circles.yml",
      constructed: 2,
      attempted: 2,
      managed: 2,
      failures: [],
    });

    const [contact, circle] = store.managed;
    expect(contact).toBeInstanceOf(Contact);
    expect(circle).toBeInstanceOf(Circle);
    expect(contact.circles).toEqual([circle]);
    expect(Array.isArray(contact.circles) && contact.circles[0]).toBe(circle);
  });

  it("commits both ends of a reference cycle", async () => {
    const report = await fixture.load("partners.yml");

    expect(report.managed).toBe(2);
    const [john, jane] = store.managed;
    expect(john.firstName).toBe("John");
    expect(jane.firstName).toBe("Jane");
    expect(john.partner).toBe(jane);
    expect(jane.partner).toBe(john);
  });

  it("builds fresh instances on every load", async () => {
    await fixture.load("circles.yml");
    await fixture.load("circles.yml");

    expect(store.managed).toHaveLength(4);
    const [firstContact, firstCircle, secondContact, secondCircle] = store.managed;
    expect(secondContact).not.toBe(firstContact);
    expect(secondCircle).not.toBe(firstCircle);
    expect(secondContact.circles).toEqual([secondCircle]);
  });

  it("searches the roots in order", async () => {
    fixture = new Fixture({
      store,
      models,
      roots: [path.join(ROOT, "no-such-root"), ROOT],
    });

    const report = await fixture.load("circles.yml");

    expect(report.managed).toBe(2);
  });

  it("reports persistence failures without rejecting", async () => {
    store.failFor = [Contact];

    const report = await fixture.load("circles.yml");

    expect(report.attempted).toBe(2);
    expect(report.managed).toBe(1);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].entityType).toBe("Contact");
    expect(report.failures[0].index).toBe(1);
    expect(store.managed[0]).toBeInstanceOf(Circle);
  });

  it("reads timestamps as the declared temporal types", async () => {
    await fixture.load("temporal.yml");

    const [ada] = store.managed;
    expect(ada).toBeInstanceOf(Contact);
    if (!(ada instanceof Contact)) return;
    expect(ada.dateOfBirth).toBe("2014-03-05");
    expect(ada.lastVisit).toBe("2014-03-05T10:30:00.000");
    expect(ada.registeredAt?.toISOString()).toBe("2014-03-04T23:30:00.000Z");
  });
});

/* ============= failed loads ============= */

describe("Fixture.load — failures", () => {
  it("rejects a missing fixture without touching the store", async () => {
    const err = await loadError(fixture, "nope.yml");

    expect(err).toBeInstanceOf(MissingFixtureError);
    expect(err instanceof Error && err.message).toBe("No such fixture found: nope.yml");
    expect(store.managed).toHaveLength(0);
  });

  it("rejects a fixture that is not well-formed", async () => {
    const err = await loadError(fixture, "malformed.yml");

    expect(err).toBeInstanceOf(ParseError);
    if (!(err instanceof ParseError)) return;
    expect(err.fixture).toBe("malformed.yml");
    expect(err.position).toBeDefined();
    expect(store.managed).toHaveLength(0);
  });

  it("rejects an unknown tag after partial construction, persisting nothing", async () => {
    const err = await loadError(fixture, "unknown-tag.yml");

    expect(err).toBeInstanceOf(UnknownTagError);
    if (!(err instanceof UnknownTagError)) return;
    expect(err.tag).toBe("!Robot:");
    expect(err.fixture).toBe("unknown-tag.yml");
    expect(store.managed).toHaveLength(0);
  });

  it("rejects a field the entity type does not declare", async () => {
    const err = await loadError(fixture, "unknown-field.yml");

    expect(err).toBeInstanceOf(ConstructionError);
    expect(err instanceof FixtureError && err.message).toBe('Unknown field "colour" on Circle');
    expect(store.managed).toHaveLength(0);
  });

  it("only binds tags for the entity types it is given", async () => {
    fixture = new Fixture({ store, models: () => [CircleType], roots: [ROOT] });

    const err = await loadError(fixture, "circles.yml");

    expect(err).toBeInstanceOf(UnknownTagError);
    expect(err instanceof UnknownTagError && err.tag).toBe("!Contact:");
  });

  it("treats a directory as missing", async () => {
    const err = await loadError(fixture, "");

    expect(err).toBeInstanceOf(MissingFixtureError);
  });
});
