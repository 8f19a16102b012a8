// src/models/contact.ts
import { Model, defineEntity, type Instant, type LocalDate, type LocalDateTime } from "../orm/index.js";
import type { Circle } from "./circle.js";
import type { Title } from "./title.js";

export class Contact extends Model {
  title?: Title | null;
  firstName?: string;
  lastName?: string | null;
  email?: string | null;
  phone?: string | null;
  dateOfBirth?: LocalDate | null;
  lastVisit?: LocalDateTime | null;
  registeredAt?: Instant | null;
  creditLimit?: number | null;
  vip?: boolean | null;
  partner?: Contact | null;
  circles?: Circle[] | null;
}

export const ContactType = defineEntity({
  name: "Contact",
  table: "contact_contact",
  module: "contact",
  model: Contact,
  fields: {
    title: { type: "manyToOne", target: "Title" },
    firstName: { type: "string" },
    lastName: { type: "string" },
    email: { type: "string" },
    phone: { type: "string" },
    dateOfBirth: { type: "date" },
    lastVisit: { type: "datetime" },
    registeredAt: { type: "instant" },
    creditLimit: { type: "decimal" },
    vip: { type: "boolean" },
    partner: { type: "manyToOne", target: "Contact" },
    circles: {
      type: "manyToMany",
      target: "Circle",
      joinTable: "contact_contact_circles",
      joinColumn: "contact_id",
      inverseColumn: "circle_id",
    },
  },
});
