import { assertNever } from "./Category";

// User-chosen severity. Not a clinical grading.

export enum SeverityLevel {
  Mild = "mild",
  Moderate = "moderate",
  Severe = "severe",
  LifeThreatening = "life_threatening",
}

export function severityLabel(level: SeverityLevel): string {
  switch (level) {
    case SeverityLevel.Mild:
      return "Mild";
    case SeverityLevel.Moderate:
      return "Moderate";
    case SeverityLevel.Severe:
      return "Severe";
    case SeverityLevel.LifeThreatening:
      return "Life-Threatening";
    default:
      return assertNever(level);
  }
}
