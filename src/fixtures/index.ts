// src/fixtures/index.ts
export { Fixture, loadFixtures, parseFixture, type FixtureOptions, type LoadFixturesOptions, type LoadReport } from "./fixture.js";
export { commitInReverse, type CommitReport } from "./committer.js";
export { GraphBuilder } from "./graphBuilder.js";
export { TypeRegistry, createTypeRegistry, tagOf } from "./tags.js";
export { coerceTemporal } from "./temporal.js";
export {
  ConstructionError,
  FixtureError,
  MissingFixtureError,
  ParseError,
  PersistenceError,
  UnknownTagError,
  type SourcePosition,
} from "./errors.js";
