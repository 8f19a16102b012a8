// src/orm/types.ts
// Entity metadata: the model base class and per-type field descriptions.

/* ---------- Model ---------- */

/**
 * Base class of every persistent entity. Subclasses declare their fields as
 * optional properties; the matching EntityType describes how each maps to a column.
 */
export abstract class Model {
  id?: string;
  [field: string]: unknown;
}

export type ModelClass<T extends Model = Model> = new () => T;

/* ---------- Fields ---------- */

export type ScalarFieldType =
  | "string"
  | "integer"
  | "decimal"
  | "boolean"
  | "date"
  | "datetime"
  | "instant";

export interface ScalarField {
  type: ScalarFieldType;
  /** Column name; defaults to the snake_case field name */
  column?: string;
}

export interface ManyToOneField {
  type: "manyToOne";
  /** Simple name of the referenced entity type */
  target: string;
  /** Column name; defaults to `<snake_case field>_id` */
  column?: string;
}

export interface ManyToManyField {
  type: "manyToMany";
  target: string;
  joinTable: string;
  /** Join column pointing at the owning entity */
  joinColumn: string;
  /** Join column pointing at the target entity */
  inverseColumn: string;
}

export type FieldDef = ScalarField | ManyToOneField | ManyToManyField;

export type RelationField = ManyToOneField | ManyToManyField;

/* ---------- Entity types ---------- */

export interface EntityType<T extends Model = Model> {
  /** Simple type name, e.g. "Contact". Fixture tags are derived from it. */
  readonly name: string;
  readonly table: string;
  /** Owning module, see modules/registry.ts */
  readonly module: string;
  readonly model: ModelClass<T>;
  readonly fields: Readonly<Record<string, FieldDef>>;
}

export function defineEntity<T extends Model>(def: EntityType<T>): EntityType<T> {
  return Object.freeze({ ...def, fields: Object.freeze({ ...def.fields }) });
}

/* ---------- Column naming ---------- */

export function toSnakeCase(name: string): string {
  return name.replace(/[A-Z]/g, c => `_${c.toLowerCase()}`);
}

/** Column of a scalar or manyToOne field */
export function columnOf(name: string, field: ScalarField | ManyToOneField): string {
  if (field.column) return field.column;
  const base = toSnakeCase(name);
  return field.type === "manyToOne" ? `${base}_id` : base;
}
