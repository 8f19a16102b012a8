// src/models/title.ts
import { Model, defineEntity } from "../orm/index.js";

/** Form of address, e.g. "Mr." */
export class Title extends Model {
  code?: string;
  name?: string | null;
}

export const TitleType = defineEntity({
  name: "Title",
  table: "contact_title",
  module: "contact",
  model: Title,
  fields: {
    code: { type: "string" },
    name: { type: "string" },
  },
});
