// src/models/sequence.ts
import { Model, defineEntity } from "../orm/index.js";

/** Named counter rendered as prefix + zero-padded number + suffix */
export class Sequence extends Model {
  name?: string;
  prefix?: string | null;
  suffix?: string | null;
  padding?: number;
  increment?: number;
  next?: number;
}

export const SequenceType = defineEntity({
  name: "Sequence",
  table: "meta_sequence",
  module: "meta",
  model: Sequence,
  fields: {
    name: { type: "string" },
    prefix: { type: "string" },
    suffix: { type: "string" },
    padding: { type: "integer" },
    increment: { type: "integer", column: "increment_by" },
    next: { type: "integer", column: "next_num" },
  },
});
