export const ACTIVITY_TYPES = ["Restricted", "Unrestricted"] as const;
export type ActivityType = (typeof ACTIVITY_TYPES)[number];

// "None" is the single canonical "not supervised" variant.
export const SUPERVISION_TYPES = ["None", "Individual", "Group"] as const;
export type SupervisionType = (typeof SUPERVISION_TYPES)[number];

export interface TimeOfDay {
  hour: number; // 0..23
  minute: number; // 0..59
  second: number; // 0..59
}

export interface SessionRecord {
  readonly id: string;
  readonly date: string; // YYYY-MM-DD, local wall-clock date
  readonly startTime: TimeOfDay;
  readonly endTime: TimeOfDay;
  readonly durationHours: number;
  readonly activityType: ActivityType;
  readonly supervisionType: SupervisionType;
  readonly supervisor: string;
  readonly energyRating: number | null; // 1..5, wellbeing only
  readonly notes: string;
}

export function isSupervised(type: SupervisionType): boolean {
  switch (type) {
    case "None":
      return false;
    case "Individual":
    case "Group":
      return true;
  }
}
