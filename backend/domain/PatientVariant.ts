// Variant membership is fixed at construction; there is no re-variant operation.

export enum PatientVariant {
  Adult = "Adult",
  Child = "Child",
  Senior = "Senior",
}

// Lowercased tags written to the `type` field of a patient record.
export const VARIANT_TAGS = {
  [PatientVariant.Adult]: "adultpatient",
  [PatientVariant.Child]: "childpatient",
  [PatientVariant.Senior]: "seniorpatient",
} as const satisfies Record<PatientVariant, string>;
