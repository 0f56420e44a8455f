import { assertNever } from "./Category";

// Where the claim about an allergy came from.

export enum SourceInfo {
  SelfReported = "self_reported",
  DoctorDiagnosed = "doctor_diagnosed",
  AllergyTest = "allergy_test",
  FamilyHistory = "family_history",
}

export function sourceInfoLabel(source: SourceInfo): string {
  switch (source) {
    case SourceInfo.SelfReported:
      return "Self-Reported";
    case SourceInfo.DoctorDiagnosed:
      return "Doctor Diagnosed";
    case SourceInfo.AllergyTest:
      return "Allergy Test";
    case SourceInfo.FamilyHistory:
      return "Family History";
    default:
      return assertNever(source);
  }
}
