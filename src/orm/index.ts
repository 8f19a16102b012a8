// src/orm/index.ts
export {
  Model,
  defineEntity,
  columnOf,
  toSnakeCase,
  type EntityType,
  type FieldDef,
  type ManyToManyField,
  type ManyToOneField,
  type ModelClass,
  type RelationField,
  type ScalarField,
  type ScalarFieldType,
} from "./types.js";
export {
  LOCAL_DATE_FORMAT,
  LOCAL_DATE_TIME_FORMAT,
  type Instant,
  type LocalDate,
  type LocalDateTime,
} from "./temporal.js";
export { EntityManager, UnknownEntityTypeError, type EntityStore } from "./entityManager.js";
