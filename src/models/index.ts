// src/models/index.ts
// Every entity type known to the application.

import type { EntityType } from "../orm/index.js";
import { AddressType } from "./address.js";
import { CircleType } from "./circle.js";
import { ContactType } from "./contact.js";
import { CountryType } from "./country.js";
import { SequenceType } from "./sequence.js";
import { TitleType } from "./title.js";

export { Address, AddressType } from "./address.js";
export { Circle, CircleType } from "./circle.js";
export { Contact, ContactType } from "./contact.js";
export { Country, CountryType } from "./country.js";
export { Sequence, SequenceType } from "./sequence.js";
export { Title, TitleType } from "./title.js";

const ALL_MODELS: readonly EntityType[] = [
  SequenceType,
  TitleType,
  CountryType,
  CircleType,
  ContactType,
  AddressType,
];

export function models(): readonly EntityType[] {
  return ALL_MODELS;
}
