// src/models/country.ts
import { Model, defineEntity } from "../orm/index.js";

export class Country extends Model {
  code?: string;
  name?: string | null;
}

export const CountryType = defineEntity({
  name: "Country",
  table: "contact_country",
  module: "contact",
  model: Country,
  fields: {
    code: { type: "string" },
    name: { type: "string" },
  },
});
