// Plain value object; no invariants.
export interface DoctorInfo {
  readonly name: string;
  readonly specialty: string;
  readonly contactInfo: string;
}
