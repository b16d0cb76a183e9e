import type { FilingRecord } from "./filing";

/**
 * Proposed write handed to the filing sink. Every variant is keyed by the
 * record's document identity and version.
 */
export type FilingIntent =
  | { kind: "create_active"; record: FilingRecord }
  | { kind: "supersede"; priorId: string; record: FilingRecord }
  | { kind: "mark_failed"; record: FilingRecord };

export type FilingIntentKind = FilingIntent["kind"];
