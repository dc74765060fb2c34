// src/core/date/types.ts

export interface FeedTimestamp {
  date: Date; // Absolute instant
  utcOffsetMinutes: number; // Offset the text was written in; 0 when defaulted
  zoneSpecified: boolean; // false when the text carried no usable zone
}
