// src/models/address.ts
import { Model, defineEntity } from "../orm/index.js";
import type { Contact } from "./contact.js";
import type { Country } from "./country.js";

export class Address extends Model {
  contact?: Contact | null;
  street?: string;
  city?: string | null;
  zip?: string | null;
  country?: Country | null;
}

export const AddressType = defineEntity({
  name: "Address",
  table: "contact_address",
  module: "contact",
  model: Address,
  fields: {
    contact: { type: "manyToOne", target: "Contact" },
    street: { type: "string" },
    city: { type: "string" },
    zip: { type: "string" },
    country: { type: "manyToOne", target: "Country" },
  },
});
