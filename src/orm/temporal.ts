// src/orm/temporal.ts
// In-memory representations of the three temporal field types.

import type { UTCDate } from "@date-fns/utc";

/** Calendar date without time of day, `yyyy-MM-dd` */
export type LocalDate = string;

/** Date and time of day without zone offset, `yyyy-MM-dd'T'HH:mm:ss.SSS` */
export type LocalDateTime = string;

/** Point in time, always in UTC */
export type Instant = UTCDate;

export const LOCAL_DATE_FORMAT = "yyyy-MM-dd";
export const LOCAL_DATE_TIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSS";
