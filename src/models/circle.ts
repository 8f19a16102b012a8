// src/models/circle.ts
import { Model, defineEntity } from "../orm/index.js";

/** A named group of contacts (family, friends, business…) */
export class Circle extends Model {
  code?: string;
  name?: string | null;
}

export const CircleType = defineEntity({
  name: "Circle",
  table: "contact_circle",
  module: "contact",
  model: Circle,
  fields: {
    code: { type: "string" },
    name: { type: "string" },
  },
});
