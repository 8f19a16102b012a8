// src/fixtures/errors.ts
// Errors raised while loading a fixture.
//
// MissingFixtureError, ParseError, UnknownTagError and ConstructionError abort
// a load before anything is persisted. PersistenceError is never thrown by a
// load; it is collected in the load report.

/** Base class of all fixture errors */
export class FixtureError extends Error {
  /** Fixture being loaded, when known */
  fixture?: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FixtureError";
  }
}

export class MissingFixtureError extends FixtureError {
  constructor(fixture: string) {
    super(`No such fixture found: ${fixture}`);
    this.name = "MissingFixtureError";
    this.fixture = fixture;
  }
}

export interface SourcePosition {
  line: number;
  col: number;
}

export class ParseError extends FixtureError {
  readonly position?: SourcePosition;

  constructor(message: string, position?: SourcePosition) {
    super(position ? `${message} (line ${position.line}, column ${position.col})` : message);
    this.name = "ParseError";
    this.position = position;
  }
}

export class UnknownTagError extends FixtureError {
  readonly tag: string;

  constructor(tag: string) {
    super(`No entity type is bound to tag ${tag}`);
    this.name = "UnknownTagError";
    this.tag = tag;
  }
}

/** A node could not be turned into the value its field declares */
export class ConstructionError extends FixtureError {
  constructor(message: string) {
    super(message);
    this.name = "ConstructionError";
  }
}

/** One entity failed to persist; the load carries on */
export class PersistenceError extends FixtureError {
  /** Entity type name of the failed instance */
  readonly entityType: string;
  /** Position of the instance in construction order */
  readonly index: number;

  constructor(entityType: string, index: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to persist ${entityType} #${index}: ${reason}`, { cause });
    this.name = "PersistenceError";
    this.entityType = entityType;
    this.index = index;
  }
}
