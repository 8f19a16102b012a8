// src/fixtures/temporal.ts
// Timestamp scalars are read by the YAML layer as plain Dates (literals
// without an offset count as UTC). This turns them into the value the target
// field declares, always taken in UTC.

import { format } from "date-fns";
import { UTCDate } from "@date-fns/utc";
import {
  LOCAL_DATE_FORMAT,
  LOCAL_DATE_TIME_FORMAT,
  type Instant,
  type LocalDate,
  type LocalDateTime,
  type ScalarFieldType,
} from "../orm/index.js";

export function coerceTemporal(raw: Date, fieldType: "date"): LocalDate;
export function coerceTemporal(raw: Date, fieldType: "datetime"): LocalDateTime;
export function coerceTemporal(raw: Date, fieldType?: ScalarFieldType): LocalDate | LocalDateTime | Instant;
export function coerceTemporal(raw: Date, fieldType?: ScalarFieldType): LocalDate | LocalDateTime | Instant {
  const utc = new UTCDate(raw.getTime());
  switch (fieldType) {
    case "date":
      return format(utc, LOCAL_DATE_FORMAT);
    case "datetime":
      return format(utc, LOCAL_DATE_TIME_FORMAT);
    default:
      return utc;
  }
}
